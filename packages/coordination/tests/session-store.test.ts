import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { InMemoryDocumentStore, defaultConfig, parseConfig, silentLogger } from '@colloquy/core';
import type { Logger } from '@colloquy/core';
import { SessionStore } from '../src/index.js';
import { bace1Session, createSession, expectOk, memorySessionStore } from './helpers.js';

const SESSION_ID = /^session-[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
const FINDING_ID = /^finding-[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

let store: SessionStore;

beforeEach(() => {
  store = memorySessionStore();
});

// ── Creation ────────────────────────────────────────────────────────

describe('createSession', () => {
  it('persists an active session with the creator as sole participant', async () => {
    const created = await store.createSession(bace1Session());
    expectOk(created);

    expect(created.sessionId).toMatch(SESSION_ID);
    const loaded = await store.getSession(created.sessionId);
    expectOk(loaded);
    expect(loaded.session.status).toBe('active');
    expect(loaded.session.participants).toEqual(['agent-a']);
    expect(loaded.session.max_participants).toBe(4);
    expect(loaded.session.version).toBe(1);
    expect(loaded.session.suggested_investigations.map((inv) => inv.id)).toEqual([
      'inv-structure',
      'inv-literature',
      'inv-admet',
    ]);
    expect(loaded.session.claimed_investigations).toEqual({});
    expect(loaded.session.findings).toEqual([]);
  });

  it('defaults capacity to the configured max_participants', async () => {
    const configured = new SessionStore(new InMemoryDocumentStore(), {
      config: parseConfig({ sessions: { max_participants: 7 } }),
      logger: silentLogger,
    });
    const created = await configured.createSession(bace1Session({ maxParticipants: undefined }));
    expectOk(created);
    expect(created.session.max_participants).toBe(7);
  });

  it('generates a distinct id per session', async () => {
    const first = await createSession(store);
    const second = await createSession(store);
    expect(first).not.toBe(second);
  });

  it('rejects duplicate investigation ids', async () => {
    const created = await store.createSession(
      bace1Session({
        suggestedInvestigations: [
          { id: 'inv-1', description: 'one' },
          { id: 'inv-1', description: 'again' },
        ],
      }),
    );
    expect(created).toMatchObject({ ok: false, error: 'invalid_input', reason: 'invalid_investigation_id' });
  });

  it('rejects metadata that cannot be stored as JSON', async () => {
    const circular: Record<string, unknown> = {};
    circular.loop = circular;
    expect(await store.createSession(bace1Session({ metadata: circular }))).toMatchObject({
      ok: false,
      error: 'invalid_input',
      reason: 'unserializable_metadata',
    });
  });

  it('rejects a capacity below one', async () => {
    const created = await store.createSession(bace1Session({ maxParticipants: 0 }));
    expect(created).toMatchObject({ ok: false, error: 'invalid_input', reason: 'invalid_capacity' });
  });
});

// ── Joining ─────────────────────────────────────────────────────────

describe('joinSession', () => {
  it('is idempotent: a second join reports already_joined and changes nothing', async () => {
    const sessionId = await createSession(store);

    expect(await store.joinSession(sessionId, 'agent-b')).toMatchObject({ ok: true, status: 'joined' });
    const again = await store.joinSession(sessionId, 'agent-b');
    const third = await store.joinSession(sessionId, 'agent-b');

    expect(again).toMatchObject({ ok: true, status: 'already_joined' });
    expect(third).toMatchObject({ ok: true, status: 'already_joined' });
    const loaded = await store.getSession(sessionId);
    expectOk(loaded);
    expect(loaded.session.participants).toEqual(['agent-a', 'agent-b']);
    expect(loaded.session.version).toBe(2);
  });

  it('reports the creator as already joined', async () => {
    const sessionId = await createSession(store);
    expect(await store.joinSession(sessionId, 'agent-a')).toMatchObject({ ok: true, status: 'already_joined' });
  });

  it('fails with capacity_exceeded once the session is full', async () => {
    const sessionId = await createSession(store, { maxParticipants: 2 });
    await store.joinSession(sessionId, 'agent-b');

    const full = await store.joinSession(sessionId, 'agent-c');
    expect(full).toMatchObject({ ok: false, error: 'capacity_exceeded', reason: 'session_full' });
  });

  it('fails with not_found for an unknown session', async () => {
    const missing = await store.joinSession('session-missing', 'agent-b');
    expect(missing).toMatchObject({ ok: false, error: 'not_found', reason: 'session_not_found' });
  });
});

// ── Claiming ────────────────────────────────────────────────────────

describe('claimInvestigation', () => {
  let sessionId: string;

  beforeEach(async () => {
    sessionId = await createSession(store);
    await store.joinSession(sessionId, 'agent-b');
    await store.joinSession(sessionId, 'agent-c');
  });

  it('claims an unclaimed investigation and records when', async () => {
    const claimed = await store.claimInvestigation(sessionId, 'inv-structure', 'agent-b');
    expectOk(claimed);
    expect(claimed.status).toBe('claimed');
    expect(claimed.investigation.description).toBe('Binding pocket structure');

    const loaded = await store.getSession(sessionId);
    expectOk(loaded);
    expect(loaded.session.claimed_investigations).toEqual({ 'inv-structure': 'agent-b' });
    expect(loaded.session.timestamps.claimed['inv-structure']).toBeDefined();
  });

  it('reports already_claimed_by_you to the holder', async () => {
    await store.claimInvestigation(sessionId, 'inv-structure', 'agent-b');
    const again = await store.claimInvestigation(sessionId, 'inv-structure', 'agent-b');
    expect(again).toMatchObject({ ok: true, status: 'already_claimed_by_you' });
  });

  it('is first-writer-wins: a later claimant sees the holder', async () => {
    await store.claimInvestigation(sessionId, 'inv-structure', 'agent-b');
    const late = await store.claimInvestigation(sessionId, 'inv-structure', 'agent-c');
    expect(late).toMatchObject({
      ok: false,
      error: 'conflict',
      reason: 'already_claimed',
      details: { investigationId: 'inv-structure', heldBy: 'agent-b' },
    });
  });

  it('fails with not_found for an investigation that was never suggested', async () => {
    const missing = await store.claimInvestigation(sessionId, 'inv-unknown', 'agent-b');
    expect(missing).toMatchObject({ ok: false, error: 'not_found', reason: 'investigation_not_found' });
  });

  it('requires the claimant to be a participant', async () => {
    const outsider = await store.claimInvestigation(sessionId, 'inv-admet', 'agent-z');
    expect(outsider).toMatchObject({ ok: false, error: 'permission_denied', reason: 'not_a_participant' });
  });

  it('lists only unclaimed investigations as available', async () => {
    await store.claimInvestigation(sessionId, 'inv-literature', 'agent-c');
    const available = await store.findAvailableInvestigations(sessionId);
    expectOk(available);
    expect(available.investigations.map((inv) => inv.id)).toEqual(['inv-structure', 'inv-admet']);
  });
});

describe('ids that match Object.prototype members', () => {
  it('claims an investigation named constructor like any other', async () => {
    const sessionId = await createSession(store, {
      suggestedInvestigations: [
        { id: 'constructor', description: 'Constructor-named investigation' },
        { id: 'toString', description: 'Another inherited name' },
      ],
    });

    const progress = await store.getSessionState(sessionId);
    expectOk(progress);
    expect(progress.state.progress.claimedInvestigations).toBe(0);

    const claimed = await store.claimInvestigation(sessionId, 'constructor', 'agent-a');
    expectOk(claimed);
    expect(claimed.status).toBe('claimed');

    await store.joinSession(sessionId, 'agent-b');
    expect(await store.claimInvestigation(sessionId, 'constructor', 'agent-b')).toMatchObject({
      ok: false,
      reason: 'already_claimed',
      details: { heldBy: 'agent-a' },
    });

    const available = await store.findAvailableInvestigations(sessionId);
    expectOk(available);
    expect(available.investigations.map((inv) => inv.id)).toEqual(['toString']);
  });

  it('rejects __proto__ as an investigation or agent id', async () => {
    const reserved = { ok: false, error: 'invalid_input', reason: 'reserved_key' };
    expect(
      await store.createSession(bace1Session({ suggestedInvestigations: [{ id: '__proto__', description: 'x' }] })),
    ).toMatchObject(reserved);
    expect(await store.createSession(bace1Session({ createdBy: '__proto__' }))).toMatchObject(reserved);

    const sessionId = await createSession(store);
    expect(await store.joinSession(sessionId, '__proto__')).toMatchObject(reserved);
  });
});

// ── Findings & validations ──────────────────────────────────────────

describe('postFinding', () => {
  it('appends a finding with an empty validation list', async () => {
    const sessionId = await createSession(store);
    const posted = await store.postFinding(sessionId, 'agent-a', {
      result: 'Compound 7 binds the catalytic aspartates',
      evidence: { toolOutputs: { pdb: { id: '2ZHV' } }, sources: ['PDB:2ZHV'] },
      confidence: 0.85,
      reasoningTrace: 'Docked compound 7\nScored -9.1 kcal/mol',
    });
    expectOk(posted);

    expect(posted.findingId).toMatch(FINDING_ID);
    expect(posted.finding).toMatchObject({
      author: 'agent-a',
      confidence: 0.85,
      evidence: { tool_outputs: { pdb: { id: '2ZHV' } }, sources: ['PDB:2ZHV'] },
      validations: [],
    });
  });

  it('rejects non-participants', async () => {
    const sessionId = await createSession(store);
    const posted = await store.postFinding(sessionId, 'agent-z', { result: 'x', confidence: 0.5 });
    expect(posted).toMatchObject({ ok: false, error: 'permission_denied', reason: 'not_a_participant' });
  });

  it('rejects confidences outside [0, 1]', async () => {
    const sessionId = await createSession(store);
    const posted = await store.postFinding(sessionId, 'agent-a', { result: 'x', confidence: 1.5 });
    expect(posted).toMatchObject({ ok: false, error: 'invalid_input', reason: 'invalid_confidence' });
  });

  it('rejects evidence that cannot be stored as JSON and leaves the session unchanged', async () => {
    const sessionId = await createSession(store);
    const circular: Record<string, unknown> = { hits: 3 };
    circular.self = circular;

    const rejected = { ok: false, error: 'invalid_input', reason: 'unserializable_evidence' };
    for (const toolOutputs of [{ blast: circular }, { count: 10n }]) {
      const posted = await store.postFinding(sessionId, 'agent-a', { result: 'x', confidence: 0.5, evidence: { toolOutputs } });
      expect(posted).toMatchObject(rejected);
    }

    const loaded = await store.getSession(sessionId);
    expectOk(loaded);
    expect(loaded.session.findings).toEqual([]);
    expect(loaded.session.version).toBe(1);
  });
});

describe('validateFinding', () => {
  let sessionId: string;
  let findingId: string;

  beforeEach(async () => {
    sessionId = await createSession(store);
    await store.joinSession(sessionId, 'agent-b');
    await store.joinSession(sessionId, 'agent-c');
    const posted = await store.postFinding(sessionId, 'agent-a', { result: 'Compound 7 is selective', confidence: 0.7 });
    expectOk(posted);
    findingId = posted.findingId;
  });

  it('always rejects the author validating their own finding', async () => {
    for (const status of ['confirmed', 'partial', 'challenged', 'inconclusive'] as const) {
      const outcome = await store.validateFinding(sessionId, findingId, 'agent-a', {
        status,
        reasoning: 'looks right to me',
        confidence: 0.9,
      });
      expect(outcome).toMatchObject({ ok: false, error: 'permission_denied', reason: 'self_validation_forbidden' });
    }
  });

  it('rejects a second validation by the same validator regardless of status', async () => {
    await store.validateFinding(sessionId, findingId, 'agent-b', {
      status: 'confirmed',
      reasoning: 'reproduced',
      confidence: 0.8,
    });

    const second = await store.validateFinding(sessionId, findingId, 'agent-b', {
      status: 'challenged',
      reasoning: 'changed my mind',
      confidence: 0.2,
    });
    expect(second).toMatchObject({ ok: false, error: 'conflict', reason: 'duplicate_validation_forbidden' });

    const loaded = await store.getSession(sessionId);
    expectOk(loaded);
    expect(loaded.session.findings[0]?.validations).toHaveLength(1);
  });

  it('reports the classification before and after the verdict', async () => {
    const first = await store.validateFinding(sessionId, findingId, 'agent-b', {
      status: 'confirmed',
      reasoning: 'reproduced',
      confidence: 0.8,
    });
    expect(first).toMatchObject({ ok: true, previousClassification: 'under_review', classification: 'validated' });

    const second = await store.validateFinding(sessionId, findingId, 'agent-c', {
      status: 'challenged',
      reasoning: 'off-target binding',
      confidence: 0.6,
    });
    expect(second).toMatchObject({ ok: true, previousClassification: 'validated', classification: 'disputed' });
  });

  it('fails with not_found for an unknown finding', async () => {
    const outcome = await store.validateFinding(sessionId, 'finding-missing', 'agent-b', {
      status: 'confirmed',
      reasoning: '',
      confidence: 0.5,
    });
    expect(outcome).toMatchObject({ ok: false, error: 'not_found', reason: 'finding_not_found' });
  });

  it('requires the validator to be a participant', async () => {
    const outcome = await store.validateFinding(sessionId, findingId, 'agent-z', {
      status: 'confirmed',
      reasoning: '',
      confidence: 0.5,
    });
    expect(outcome).toMatchObject({ ok: false, error: 'permission_denied', reason: 'not_a_participant' });
  });
});

// ── Derived state ───────────────────────────────────────────────────

describe('getSessionState', () => {
  it('classifies a confirmed-then-challenged finding as disputed (BACE1 scenario)', async () => {
    const sessionId = await createSession(store, { maxParticipants: 4 });
    expect(await store.joinSession(sessionId, 'agent-b')).toMatchObject({ ok: true, status: 'joined' });

    const posted = await store.postFinding(sessionId, 'agent-a', {
      result: 'Compound 7 inhibits BACE1 at nanomolar concentration',
      confidence: 0.85,
    });
    expectOk(posted);

    expectOk(
      await store.validateFinding(sessionId, posted.findingId, 'agent-b', {
        status: 'confirmed',
        reasoning: 'Matches published IC50',
        confidence: 0.8,
      }),
    );
    expect(await store.joinSession(sessionId, 'agent-c')).toMatchObject({ ok: true, status: 'joined' });
    expectOk(
      await store.validateFinding(sessionId, posted.findingId, 'agent-c', {
        status: 'challenged',
        reasoning: 'Assay used a truncated construct',
        confidence: 0.7,
      }),
    );

    const state = await store.getSessionState(sessionId);
    expectOk(state);
    expect(state.state.perFindingClassification).toEqual({ [posted.findingId]: 'disputed' });
    expect(state.state.totalFindings).toBe(1);
    expect(state.state.consensusRate).toBe(0);
    expect(state.state.debateRate).toBe(1);
  });

  it('reports investigation progress', async () => {
    const sessionId = await createSession(store);
    await store.joinSession(sessionId, 'agent-b');
    await store.claimInvestigation(sessionId, 'inv-structure', 'agent-b');

    const state = await store.getSessionState(sessionId);
    expectOk(state);
    expect(state.state.progress).toMatchObject({
      totalInvestigations: 3,
      claimedInvestigations: 1,
      unclaimedInvestigations: 2,
    });
    expect(state.state.progress.claimedPercent).toBeCloseTo(33.33, 2);
  });

  it('does not write to storage', async () => {
    const backing = new InMemoryDocumentStore();
    const readOnly = new SessionStore(backing, { logger: silentLogger });
    const sessionId = await createSession(readOnly);
    const before = backing.getRaw(sessionId);

    await readOnly.getSessionState(sessionId);
    expect(backing.getRaw(sessionId)).toBe(before);
  });
});

// ── Completion & abandonment ────────────────────────────────────────

describe('completeSession', () => {
  it('is a one-way transition, idempotent for the same summary', async () => {
    const sessionId = await createSession(store);

    const completed = await store.completeSession(sessionId, 'Compound 7 is the lead', 'post-42');
    expectOk(completed);
    expect(completed.status).toBe('completed');
    expect(completed.session.result_post_id).toBe('post-42');
    expect(completed.session.completed_at).not.toBeNull();

    const again = await store.completeSession(sessionId, 'Compound 7 is the lead');
    expect(again).toMatchObject({ ok: true, status: 'already_complete' });
  });

  it('rejects completing again with a different summary', async () => {
    const sessionId = await createSession(store);
    await store.completeSession(sessionId, 'first summary');

    const different = await store.completeSession(sessionId, 'second summary');
    expect(different).toMatchObject({ ok: false, error: 'conflict', reason: 'already_completed' });
  });

  it('closes the session to further mutations', async () => {
    const sessionId = await createSession(store);
    await store.completeSession(sessionId, 'done');

    expect(await store.joinSession(sessionId, 'agent-b')).toMatchObject({
      ok: false,
      error: 'conflict',
      reason: 'session_closed',
    });
    expect(await store.postFinding(sessionId, 'agent-a', { result: 'late', confidence: 0.5 })).toMatchObject({
      ok: false,
      reason: 'session_closed',
    });
  });
});

describe('abandonSession', () => {
  it('only lets the creator abandon', async () => {
    const sessionId = await createSession(store);
    await store.joinSession(sessionId, 'agent-b');

    expect(await store.abandonSession(sessionId, 'agent-b', 'bored')).toMatchObject({
      ok: false,
      error: 'permission_denied',
      reason: 'not_creator',
    });

    const abandoned = await store.abandonSession(sessionId, 'agent-a', 'target deprioritised');
    expectOk(abandoned);
    expect(abandoned.session.status).toBe('abandoned');
    expect(abandoned.session.abandoned_reason).toBe('target deprioritised');
    expect(await store.abandonSession(sessionId, 'agent-a', 'again')).toMatchObject({
      ok: true,
      status: 'already_abandoned',
    });
  });

  it('prevents completing an abandoned session', async () => {
    const sessionId = await createSession(store);
    await store.abandonSession(sessionId, 'agent-a', 'duplicate');
    expect(await store.completeSession(sessionId, 'summary')).toMatchObject({ ok: false, reason: 'session_closed' });
  });
});

// ── Listing & corruption ────────────────────────────────────────────

describe('listActiveSessions', () => {
  it('lists active sessions only and skips unreadable documents', async () => {
    const backing = new InMemoryDocumentStore();
    const listing = new SessionStore(backing, { logger: silentLogger });
    const active = await createSession(listing);
    const done = await createSession(listing);
    await listing.completeSession(done, 'finished');
    backing.putRaw('session-broken', '{"topic": ');

    const listed = await listing.listActiveSessions();
    expectOk(listed);
    expect(listed.sessions.map((s) => s.id)).toEqual([active]);
    expect(listed.sessions[0]).toMatchObject({
      topic: 'BACE1 investigation',
      createdBy: 'agent-a',
      participants: ['agent-a'],
      totalInvestigations: 3,
      claimedInvestigations: 0,
      findingCount: 0,
    });
  });
});

describe('corrupt session documents', () => {
  it('report corrupt_state with a warning instead of throwing', async () => {
    const backing = new InMemoryDocumentStore();
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    const corruptStore = new SessionStore(backing, { logger });
    backing.putRaw('session-broken', JSON.stringify({ id: 'session-broken', version: 3 }));

    expect(await corruptStore.getSession('session-broken')).toMatchObject({
      ok: false,
      error: 'corrupt_state',
      reason: 'corrupt_session',
    });
    expect(await corruptStore.joinSession('session-broken', 'agent-b')).toMatchObject({
      ok: false,
      error: 'corrupt_state',
    });
    expect(warn).toHaveBeenCalled();
  });
});

// ── Concurrency over the file store ─────────────────────────────────

describe('SessionStore over files shared by several processes', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'colloquy-sessions-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function openStore(): SessionStore {
    const config = defaultConfig();
    return SessionStore.open(tmpDir, { config: { ...config, storage: { ...config.storage, cas_max_retries: 20 } }, logger: silentLogger });
  }

  it('resolves two concurrent claims to exactly one winner', async () => {
    const processA = openStore();
    const processB = openStore();
    const sessionId = await createSession(processA);
    await processA.joinSession(sessionId, 'agent-b');
    await processA.joinSession(sessionId, 'agent-c');

    const [b, c] = await Promise.all([
      processA.claimInvestigation(sessionId, 'inv-structure', 'agent-b'),
      processB.claimInvestigation(sessionId, 'inv-structure', 'agent-c'),
    ]);

    const outcomes = [b, c];
    const winners = outcomes.filter((o) => o.ok);
    const losers = outcomes.filter((o) => !o.ok);
    expect(winners).toHaveLength(1);
    expect(losers).toHaveLength(1);

    const loaded = await processB.getSession(sessionId);
    expectOk(loaded);
    const holder = loaded.session.claimed_investigations['inv-structure'];
    expect(losers[0]).toMatchObject({ error: 'conflict', reason: 'already_claimed', details: { heldBy: holder } });
  });

  it('loses no participant when agents join concurrently', async () => {
    const creator = openStore();
    const sessionId = await createSession(creator, { maxParticipants: 5 });

    const joins = await Promise.all(
      ['agent-b', 'agent-c', 'agent-d', 'agent-e'].map((agent) => openStore().joinSession(sessionId, agent)),
    );
    expect(joins.every((j) => j.ok && j.status === 'joined')).toBe(true);

    const loaded = await creator.getSession(sessionId);
    expectOk(loaded);
    expect([...loaded.session.participants].sort()).toEqual(['agent-a', 'agent-b', 'agent-c', 'agent-d', 'agent-e']);
    expect(loaded.session.version).toBe(5);
  });

  it('rejects session ids that are not valid file names', async () => {
    const fileStore = openStore();
    expect(await fileStore.getSession('../escape')).toMatchObject({ ok: false, error: 'invalid_input' });
  });
});
