import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { silentLogger } from '@colloquy/core';
import type { Logger } from '@colloquy/core';
import { EventLog, SessionRecorder, SessionStore } from '../src/index.js';
import type { CoordinationEvent } from '../src/index.js';
import { bace1Session, expectOk, memorySessionStore } from './helpers.js';

let tmpDir: string;
let sessions: SessionStore;
let events: EventLog;
let recorder: SessionRecorder;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'colloquy-recorder-test-'));
  sessions = memorySessionStore();
  events = new EventLog(tmpDir, { logger: silentLogger });
  recorder = new SessionRecorder(sessions, events, { logger: silentLogger });
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function logged(sessionId: string): Promise<CoordinationEvent[]> {
  const read = await events.readEvents(sessionId);
  expectOk(read);
  return read.events;
}

async function loggedTypes(sessionId: string): Promise<string[]> {
  return (await logged(sessionId)).map((e) => e.event_type);
}

async function start(): Promise<string> {
  const created = await recorder.createSession(bace1Session(), { mode: 'parallel' });
  expectOk(created);
  return created.sessionId;
}

describe('SessionRecorder', () => {
  it('mirrors each state change as one event, in order', async () => {
    const sessionId = await start();
    await recorder.joinSession(sessionId, 'agent-b', { reasoning: 'knows the structure', skillMatch: { pdb: true } });
    await recorder.joinSession(sessionId, 'agent-b');
    await recorder.claimInvestigation(sessionId, 'inv-structure', 'agent-b');
    await recorder.claimInvestigation(sessionId, 'inv-structure', 'agent-b');

    expect(await loggedTypes(sessionId)).toEqual(['SessionCreated', 'AgentJoinedSession', 'AgentClaimedTask']);

    const [created, joined, claimed] = await logged(sessionId);
    expect(created?.payload).toEqual({
      topic: 'BACE1 investigation',
      description: 'Inhibitor candidates for beta-secretase 1',
      created_by: 'agent-a',
      strategy: { mode: 'parallel' },
    });
    expect(joined?.payload).toEqual({
      agent_name: 'agent-b',
      reasoning: 'knows the structure',
      skill_match: { pdb: true },
    });
    expect(claimed?.payload).toEqual({
      task_id: 'inv-structure',
      agent_name: 'agent-b',
      role: 'investigator',
      reasoning: '',
    });
  });

  it('records a posted finding as its evidence record plus a summary', async () => {
    const sessionId = await start();
    const posted = await recorder.postFinding(sessionId, 'agent-a', {
      result: 'Compound 7 is selective over BACE2',
      evidence: { toolOutputs: { chembl: { ratio: 40 } }, sources: ['CHEMBL:7'] },
      confidence: 0.75,
      reasoningTrace: 'Compared IC50 values',
    });
    expectOk(posted);

    const [, completed, summary] = await logged(sessionId);
    expect(completed?.payload).toEqual({
      task_id: posted.findingId,
      agent_name: 'agent-a',
      result: 'Compound 7 is selective over BACE2',
      evidence: {
        tool_outputs: { chembl: { ratio: 40 } },
        tool_params: {},
        reasoning_trace: 'Compared IC50 values',
        confidence: 0.75,
        sources: ['CHEMBL:7'],
      },
    });
    expect(summary?.payload).toEqual({
      agent_name: 'agent-a',
      task_id: posted.findingId,
      finding_summary: 'Compound 7 is selective over BACE2',
      confidence: 0.75,
    });
  });

  it('records consensus and disagreement when the classification changes', async () => {
    const sessionId = await start();
    for (const agent of ['agent-b', 'agent-c', 'agent-d']) await recorder.joinSession(sessionId, agent);
    const posted = await recorder.postFinding(sessionId, 'agent-a', { result: 'Compound 7 is potent', confidence: 0.8 });
    expectOk(posted);
    const { findingId } = posted;

    await recorder.validateFinding(sessionId, findingId, 'agent-b', { status: 'confirmed', reasoning: 'ok', confidence: 0.8 });
    await recorder.validateFinding(sessionId, findingId, 'agent-c', { status: 'partial', reasoning: 'mostly', confidence: 0.5 });
    await recorder.validateFinding(sessionId, findingId, 'agent-d', { status: 'challenged', reasoning: 'no', confidence: 0.7 });

    const all = await logged(sessionId);
    expect(all.slice(6).map((e) => e.event_type)).toEqual([
      'AgentValidatedFinding',
      'ConsensusReached',
      'AgentValidatedFinding',
      'AgentChallengedFinding',
      'DisagreementRecorded',
    ]);
    expect(all[7]?.payload).toEqual({
      task_id: findingId,
      consensus_statement: 'Compound 7 is potent',
      validators: ['agent-b'],
      confidence: 0.8,
    });
    expect(all[8]?.payload).toEqual({
      validator_agent: 'agent-c',
      validated_task_id: findingId,
      validation_result: { status: 'partial', confidence: 0.5, reasoning: 'mostly' },
    });
    expect(all[9]?.payload).toEqual({
      challenger_agent: 'agent-d',
      challenged_task_id: findingId,
      challenge_reasoning: 'no',
      alternative_hypothesis: null,
      confidence: 0.7,
    });
    expect(all[10]?.payload).toEqual({
      task_id: findingId,
      agent_names: ['agent-b', 'agent-d'],
      disagreement_type: 'validation',
      description: '1 confirmation(s) against 1 challenge(s)',
    });
  });

  it('records completion once', async () => {
    const sessionId = await start();
    expectOk(await recorder.completeSession(sessionId, 'Compound 7 is the lead', 'post-9'));
    expect(await recorder.completeSession(sessionId, 'Compound 7 is the lead')).toMatchObject({
      ok: true,
      status: 'already_complete',
    });

    const all = await logged(sessionId);
    expect(all.map((e) => e.event_type)).toEqual(['SessionCreated', 'SessionCompleted']);
    expect(all[1]?.payload).toEqual({ summary: 'Compound 7 is the lead', result_post_id: 'post-9' });
  });

  it('logs nothing for rejected operations', async () => {
    const sessionId = await start();
    const posted = await recorder.postFinding(sessionId, 'agent-a', { result: 'x', confidence: 0.5 });
    expectOk(posted);

    expect(await recorder.claimInvestigation(sessionId, 'inv-admet', 'agent-z')).toMatchObject({ ok: false });
    expect(
      await recorder.validateFinding(sessionId, posted.findingId, 'agent-a', {
        status: 'confirmed',
        reasoning: 'mine',
        confidence: 1,
      }),
    ).toMatchObject({ ok: false, reason: 'self_validation_forbidden' });

    expect(await loggedTypes(sessionId)).toEqual(['SessionCreated', 'AgentCompletedTask', 'AgentPostedFinding']);
  });

  it('keeps the committed outcome when the log cannot be written', async () => {
    // A file where the .colloquy directory should be makes every append fail.
    await fs.writeFile(path.join(tmpDir, '.colloquy'), 'not a directory', 'utf-8');
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    const failing = new SessionRecorder(sessions, new EventLog(tmpDir, { logger: silentLogger }), { logger });

    const created = await failing.createSession(bace1Session());
    expectOk(created);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toContain('Failed to record SessionCreated');

    const stored = await sessions.getSession(created.sessionId);
    expectOk(stored);
    expect(stored.session.topic).toBe('BACE1 investigation');
  });
});
