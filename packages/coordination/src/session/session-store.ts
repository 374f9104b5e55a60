/**
 * SessionStore — lifecycle, claiming, findings and validations for shared
 * investigation sessions.
 *
 * Each session is one versioned document (.colloquy/sessions/<id>.json).
 * Every mutator is a read-compute-compare-and-swap cycle via
 * `updateDocument`, so concurrent agents never overwrite each other's
 * updates. Expected failures come back as `Failure` values.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ErrorKind,
  FileDocumentStore,
  createLogger,
  defaultConfig,
  failure,
  failureFromError,
  getSessionsDir,
  hasOwnKey,
  isJsonSerializable,
  isReservedKey,
  ownValue,
  readDocument,
  updateDocument,
} from '@colloquy/core';
import type {
  ColloquyConfig,
  DocumentCodec,
  DocumentStore,
  Failure,
  Logger,
  Mutation,
  UpdateOptions,
} from '@colloquy/core';
import { SessionSchema, ValidationStatus } from './types.js';
import type {
  CreateSessionParams,
  Finding,
  Investigation,
  PostFindingParams,
  Session,
  SessionSummary,
  ValidateFindingParams,
  Validation,
} from './types.js';
import { classifyFinding, summarizeConsensus } from './consensus.js';
import type { ConsensusSummary, FindingClassification } from './consensus.js';

export const SESSION_CODEC: DocumentCodec<Session> = {
  kind: 'session',
  schema: SessionSchema,
};

// ── Outcomes ────────────────────────────────────────────────────────

export type CreateSessionOutcome =
  | { ok: true; status: 'created'; sessionId: string; session: Session }
  | Failure;

export type JoinSessionOutcome =
  | { ok: true; status: 'joined' | 'already_joined'; session: Session }
  | Failure;

export type ClaimInvestigationOutcome =
  | { ok: true; status: 'claimed' | 'already_claimed_by_you'; investigation: Investigation }
  | Failure;

export type PostFindingOutcome =
  | { ok: true; status: 'posted'; findingId: string; finding: Finding }
  | Failure;

export type ValidateFindingOutcome =
  | {
      ok: true;
      status: 'validated';
      validation: Validation;
      finding: Finding;
      previousClassification: FindingClassification;
      classification: FindingClassification;
    }
  | Failure;

export type CompleteSessionOutcome =
  | { ok: true; status: 'completed' | 'already_complete'; session: Session }
  | Failure;

export type AbandonSessionOutcome =
  | { ok: true; status: 'abandoned' | 'already_abandoned'; session: Session }
  | Failure;

export type GetSessionOutcome = { ok: true; session: Session } | Failure;

export interface SessionProgress {
  totalInvestigations: number;
  claimedInvestigations: number;
  unclaimedInvestigations: number;
  /** Claimed share of suggested investigations, 0–100. */
  claimedPercent: number;
}

/** Derived, read-only view of a session. */
export interface SessionState {
  session: Session;
  perFindingClassification: Record<string, FindingClassification>;
  totalFindings: number;
  counts: ConsensusSummary['counts'];
  consensusRate: number;
  debateRate: number;
  progress: SessionProgress;
}

export type SessionStateOutcome = { ok: true; state: SessionState } | Failure;

export type ListSessionsOutcome = { ok: true; sessions: SessionSummary[] } | Failure;

export type AvailableInvestigationsOutcome = { ok: true; investigations: Investigation[] } | Failure;

// ── Store ───────────────────────────────────────────────────────────

export interface SessionStoreOptions {
  config?: ColloquyConfig;
  logger?: Logger;
}

function sessionNotFound(sessionId: string): Failure {
  return failure(ErrorKind.NotFound, 'session_not_found', `Session "${sessionId}" not found`, { sessionId });
}

function invalidInput(reason: string, message: string, details?: Record<string, unknown>): Failure {
  return failure(ErrorKind.InvalidInput, reason, message, details);
}

function reservedKey(kind: string, key: string): Failure {
  return invalidInput('reserved_key', `"${key}" cannot be used as ${kind}`, { key });
}

function isConfidence(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

const VALIDATION_STATUSES: readonly string[] = Object.values(ValidationStatus);

export class SessionStore {
  private readonly config: ColloquyConfig;
  private readonly logger: Logger;
  private readonly updateOptions: UpdateOptions;

  constructor(
    private readonly store: DocumentStore,
    options: SessionStoreOptions = {},
  ) {
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? createLogger('session-store', { level: this.config.logging.level });
    this.updateOptions = {
      maxRetries: this.config.storage.cas_max_retries,
      backoffMs: this.config.storage.cas_backoff_ms,
      logger: this.logger,
    };
  }

  /** SessionStore over `<workspace>/.colloquy/sessions/`. */
  static open(workspacePath: string, options: SessionStoreOptions = {}): SessionStore {
    const config = options.config ?? defaultConfig();
    const store = new FileDocumentStore(getSessionsDir(workspacePath), {
      lock: { stale: config.storage.lock_stale_ms },
    });
    return new SessionStore(store, { ...options, config });
  }

  // ── Lifecycle ─────────────────────────────────────────────────────

  async createSession(params: CreateSessionParams): Promise<CreateSessionOutcome> {
    const maxParticipants = params.maxParticipants ?? this.config.sessions.max_participants;
    if (!params.createdBy) {
      return invalidInput('missing_creator', 'createdBy is required');
    }
    if (isReservedKey(params.createdBy)) return reservedKey('an agent id', params.createdBy);
    if (!isJsonSerializable(params.metadata ?? {})) {
      return invalidInput('unserializable_metadata', 'metadata must be JSON-serializable');
    }
    if (!Number.isInteger(maxParticipants) || maxParticipants < 1) {
      return invalidInput('invalid_capacity', `maxParticipants must be a positive integer, got ${maxParticipants}`);
    }
    const seen = new Set<string>();
    for (const inv of params.suggestedInvestigations) {
      if (isReservedKey(inv.id)) return reservedKey('an investigation id', inv.id);
      if (!inv.id || seen.has(inv.id)) {
        return invalidInput(
          'invalid_investigation_id',
          `Investigation ids must be unique and non-empty (offending id: "${inv.id}")`,
          { investigationId: inv.id },
        );
      }
      seen.add(inv.id);
    }

    const sessionId = `session-${uuidv4()}`;
    const now = new Date().toISOString();
    const draft: Omit<Session, 'version'> = {
      id: sessionId,
      topic: params.topic,
      description: params.description,
      created_by: params.createdBy,
      created_at: now,
      status: 'active',
      max_participants: maxParticipants,
      participants: [params.createdBy],
      suggested_investigations: params.suggestedInvestigations.map((inv) => ({
        id: inv.id,
        description: inv.description,
        needed_skills: [...(inv.neededSkills ?? [])],
      })),
      claimed_investigations: {},
      findings: [],
      timestamps: { joined: { [params.createdBy]: now }, claimed: {} },
      summary: null,
      result_post_id: null,
      completed_at: null,
      abandoned_reason: null,
      metadata: { ...(params.metadata ?? {}) },
    };

    try {
      const outcome = await updateDocument<Session, CreateSessionOutcome>(
        this.store,
        sessionId,
        SESSION_CODEC,
        (current) => {
          if (current.status !== 'missing') {
            return {
              result: failure(ErrorKind.Conflict, 'session_exists', `Session "${sessionId}" already exists`),
            };
          }
          return {
            write: draft,
            result: { ok: true, status: 'created', sessionId, session: { ...draft, version: 1 } },
          };
        },
        this.updateOptions,
      );
      if (outcome.ok) {
        this.logger.info(`Created session ${sessionId} "${params.topic}" by ${params.createdBy}`);
      }
      return outcome;
    } catch (err) {
      return failureFromError(err);
    }
  }

  async joinSession(sessionId: string, agentId: string): Promise<JoinSessionOutcome> {
    if (!agentId) return invalidInput('missing_agent', 'agentId is required');
    if (isReservedKey(agentId)) return reservedKey('an agent id', agentId);

    return this.mutate<JoinSessionOutcome>(sessionId, (session) => {
      if (session.participants.includes(agentId)) {
        return { result: { ok: true, status: 'already_joined', session } };
      }
      const closed = this.rejectIfClosed(session);
      if (closed) return { result: closed };
      if (session.participants.length >= session.max_participants) {
        return {
          result: failure(
            ErrorKind.CapacityExceeded,
            'session_full',
            `Session "${sessionId}" is full (${session.max_participants} participants)`,
            { maxParticipants: session.max_participants },
          ),
        };
      }

      const next: Session = {
        ...session,
        participants: [...session.participants, agentId],
        timestamps: {
          ...session.timestamps,
          joined: { ...session.timestamps.joined, [agentId]: new Date().toISOString() },
        },
        version: session.version + 1,
      };
      return { write: next, result: { ok: true, status: 'joined', session: next } };
    });
  }

  async claimInvestigation(
    sessionId: string,
    investigationId: string,
    agentId: string,
  ): Promise<ClaimInvestigationOutcome> {
    if (!agentId) return invalidInput('missing_agent', 'agentId is required');

    return this.mutate<ClaimInvestigationOutcome>(sessionId, (session) => {
      const investigation = session.suggested_investigations.find((inv) => inv.id === investigationId);
      if (!investigation) {
        return {
          result: failure(
            ErrorKind.NotFound,
            'investigation_not_found',
            `Investigation "${investigationId}" is not suggested in session "${sessionId}"`,
            { investigationId },
          ),
        };
      }

      const holder = ownValue(session.claimed_investigations, investigationId);
      if (holder === agentId) {
        return { result: { ok: true, status: 'already_claimed_by_you', investigation } };
      }
      if (holder !== undefined) {
        return {
          result: failure(
            ErrorKind.Conflict,
            'already_claimed',
            `Investigation "${investigationId}" is already claimed by ${holder}`,
            { investigationId, heldBy: holder },
          ),
        };
      }

      const closed = this.rejectIfClosed(session);
      if (closed) return { result: closed };
      const notMember = this.rejectNonParticipant(session, agentId);
      if (notMember) return { result: notMember };

      return {
        write: {
          ...session,
          claimed_investigations: { ...session.claimed_investigations, [investigationId]: agentId },
          timestamps: {
            ...session.timestamps,
            claimed: { ...session.timestamps.claimed, [investigationId]: new Date().toISOString() },
          },
        },
        result: { ok: true, status: 'claimed', investigation },
      };
    });
  }

  async postFinding(
    sessionId: string,
    agentId: string,
    params: PostFindingParams,
  ): Promise<PostFindingOutcome> {
    if (!isConfidence(params.confidence)) {
      return invalidInput('invalid_confidence', `confidence must be within [0, 1], got ${params.confidence}`);
    }
    if (!isJsonSerializable(params.evidence ?? {})) {
      return invalidInput('unserializable_evidence', 'evidence must be JSON-serializable');
    }

    const findingId = `finding-${uuidv4()}`;
    return this.mutate<PostFindingOutcome>(sessionId, (session) => {
      const closed = this.rejectIfClosed(session);
      if (closed) return { result: closed };
      const notMember = this.rejectNonParticipant(session, agentId);
      if (notMember) return { result: notMember };

      const finding: Finding = {
        id: findingId,
        author: agentId,
        result: params.result,
        evidence: {
          tool_outputs: { ...(params.evidence?.toolOutputs ?? {}) },
          sources: [...(params.evidence?.sources ?? [])],
        },
        confidence: params.confidence,
        reasoning_trace: params.reasoningTrace ?? '',
        created_at: new Date().toISOString(),
        validations: [],
      };
      return {
        write: { ...session, findings: [...session.findings, finding] },
        result: { ok: true, status: 'posted', findingId, finding },
      };
    });
  }

  async validateFinding(
    sessionId: string,
    findingId: string,
    validatorId: string,
    params: ValidateFindingParams,
  ): Promise<ValidateFindingOutcome> {
    if (!VALIDATION_STATUSES.includes(params.status)) {
      return invalidInput('invalid_status', `Unknown validation status "${params.status}"`);
    }
    if (!isConfidence(params.confidence)) {
      return invalidInput('invalid_confidence', `confidence must be within [0, 1], got ${params.confidence}`);
    }

    return this.mutate<ValidateFindingOutcome>(sessionId, (session) => {
      const index = session.findings.findIndex((f) => f.id === findingId);
      const finding = session.findings[index];
      if (!finding) {
        return {
          result: failure(ErrorKind.NotFound, 'finding_not_found', `Finding "${findingId}" not found`, { findingId }),
        };
      }
      if (finding.author === validatorId) {
        return {
          result: failure(
            ErrorKind.PermissionDenied,
            'self_validation_forbidden',
            `${validatorId} cannot validate their own finding "${findingId}"`,
            { findingId },
          ),
        };
      }
      if (finding.validations.some((v) => v.validator === validatorId)) {
        return {
          result: failure(
            ErrorKind.Conflict,
            'duplicate_validation_forbidden',
            `${validatorId} has already validated finding "${findingId}"`,
            { findingId },
          ),
        };
      }
      const closed = this.rejectIfClosed(session);
      if (closed) return { result: closed };
      const notMember = this.rejectNonParticipant(session, validatorId);
      if (notMember) return { result: notMember };

      const validation: Validation = {
        validator: validatorId,
        status: params.status,
        reasoning: params.reasoning,
        confidence: params.confidence,
        created_at: new Date().toISOString(),
      };
      const updated: Finding = { ...finding, validations: [...finding.validations, validation] };
      const findings = [...session.findings];
      findings[index] = updated;

      return {
        write: { ...session, findings },
        result: {
          ok: true,
          status: 'validated',
          validation,
          finding: updated,
          previousClassification: classifyFinding(finding.validations),
          classification: classifyFinding(updated.validations),
        },
      };
    });
  }

  /**
   * Mark a session complete. Repeating the call with the same summary is
   * a no-op; a different summary is a conflict.
   */
  async completeSession(
    sessionId: string,
    summary: string,
    resultPostId?: string,
  ): Promise<CompleteSessionOutcome> {
    const outcome = await this.mutate<CompleteSessionOutcome>(sessionId, (session) => {
      if (session.status === 'complete') {
        if (session.summary === summary) {
          return { result: { ok: true, status: 'already_complete', session } };
        }
        return {
          result: failure(
            ErrorKind.Conflict,
            'already_completed',
            `Session "${sessionId}" was already completed with a different summary`,
          ),
        };
      }
      const closed = this.rejectIfClosed(session);
      if (closed) return { result: closed };

      const next: Session = {
        ...session,
        status: 'complete',
        summary,
        result_post_id: resultPostId ?? null,
        completed_at: new Date().toISOString(),
        version: session.version + 1,
      };
      return { write: next, result: { ok: true, status: 'completed', session: next } };
    });
    if (outcome.ok && outcome.status === 'completed') {
      this.logger.info(`Completed session ${sessionId}`);
    }
    return outcome;
  }

  /** Abandon an active session. Only its creator may do so. */
  async abandonSession(sessionId: string, agentId: string, reason: string): Promise<AbandonSessionOutcome> {
    const outcome = await this.mutate<AbandonSessionOutcome>(sessionId, (session) => {
      if (session.created_by !== agentId) {
        return {
          result: failure(
            ErrorKind.PermissionDenied,
            'not_creator',
            `Only ${session.created_by} can abandon session "${sessionId}"`,
          ),
        };
      }
      if (session.status === 'abandoned') {
        return { result: { ok: true, status: 'already_abandoned', session } };
      }
      const closed = this.rejectIfClosed(session);
      if (closed) return { result: closed };

      const next: Session = {
        ...session,
        status: 'abandoned',
        abandoned_reason: reason,
        version: session.version + 1,
      };
      return { write: next, result: { ok: true, status: 'abandoned', session: next } };
    });
    if (outcome.ok && outcome.status === 'abandoned') {
      this.logger.info(`Abandoned session ${sessionId}: ${reason}`);
    }
    return outcome;
  }

  // ── Reads ─────────────────────────────────────────────────────────

  async getSession(sessionId: string): Promise<GetSessionOutcome> {
    try {
      const read = await readDocument(this.store, sessionId, SESSION_CODEC, this.logger);
      if (read.status === 'missing') return sessionNotFound(sessionId);
      if (read.status === 'corrupt') return this.corrupt(sessionId, read.reason);
      return { ok: true, session: read.document };
    } catch (err) {
      return failureFromError(err);
    }
  }

  /** Derived view: per-finding classification, consensus rate and progress. Never writes. */
  async getSessionState(sessionId: string): Promise<SessionStateOutcome> {
    const read = await this.getSession(sessionId);
    if (!read.ok) return read;

    const { session } = read;
    const summary = summarizeConsensus(session.findings);
    const perFindingClassification: Record<string, FindingClassification> = {};
    for (const entry of summary.byFinding) {
      perFindingClassification[entry.findingId] = entry.classification;
    }

    const total = session.suggested_investigations.length;
    const claimed = session.suggested_investigations.filter(
      (inv) => hasOwnKey(session.claimed_investigations, inv.id),
    ).length;

    return {
      ok: true,
      state: {
        session,
        perFindingClassification,
        totalFindings: summary.totalFindings,
        counts: summary.counts,
        consensusRate: summary.consensusRate,
        debateRate: summary.debateRate,
        progress: {
          totalInvestigations: total,
          claimedInvestigations: claimed,
          unclaimedInvestigations: total - claimed,
          claimedPercent: total > 0 ? (claimed / total) * 100 : 0,
        },
      },
    };
  }

  /** Summaries of every readable active session. Corrupt documents are skipped with a warning. */
  async listActiveSessions(): Promise<ListSessionsOutcome> {
    try {
      const ids = await this.store.list();
      const sessions: SessionSummary[] = [];
      for (const id of ids) {
        const read = await readDocument(this.store, id, SESSION_CODEC, this.logger);
        if (read.status !== 'ok' || read.document.status !== 'active') continue;
        const s = read.document;
        sessions.push({
          id: s.id,
          topic: s.topic,
          createdBy: s.created_by,
          createdAt: s.created_at,
          participants: [...s.participants],
          maxParticipants: s.max_participants,
          totalInvestigations: s.suggested_investigations.length,
          claimedInvestigations: Object.keys(s.claimed_investigations).length,
          findingCount: s.findings.length,
        });
      }
      sessions.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
      return { ok: true, sessions };
    } catch (err) {
      return failureFromError(err);
    }
  }

  /** Suggested investigations nobody has claimed yet, in suggestion order. */
  async findAvailableInvestigations(sessionId: string): Promise<AvailableInvestigationsOutcome> {
    const read = await this.getSession(sessionId);
    if (!read.ok) return read;
    const { session } = read;
    return {
      ok: true,
      investigations: session.suggested_investigations.filter(
        (inv) => !hasOwnKey(session.claimed_investigations, inv.id),
      ),
    };
  }

  // ── Internals ─────────────────────────────────────────────────────

  private async mutate<R extends { ok: boolean }>(
    sessionId: string,
    apply: (session: Session) => Mutation<Session, R | Failure>,
  ): Promise<R | Failure> {
    try {
      return await updateDocument<Session, R | Failure>(
        this.store,
        sessionId,
        SESSION_CODEC,
        (current) => {
          if (current.status === 'missing') return { result: sessionNotFound(sessionId) };
          if (current.status === 'corrupt') return { result: this.corrupt(sessionId, current.reason) };
          return apply(current.document);
        },
        this.updateOptions,
      );
    } catch (err) {
      return failureFromError(err);
    }
  }

  private corrupt(sessionId: string, reason: string): Failure {
    return failure(ErrorKind.CorruptState, 'corrupt_session', `Session "${sessionId}" is unreadable: ${reason}`, {
      sessionId,
    });
  }

  private rejectIfClosed(session: Session): Failure | null {
    if (session.status === 'active') return null;
    return failure(ErrorKind.Conflict, 'session_closed', `Session "${session.id}" is ${session.status}`, {
      status: session.status,
    });
  }

  private rejectNonParticipant(session: Session, agentId: string): Failure | null {
    if (session.participants.includes(agentId)) return null;
    return failure(
      ErrorKind.PermissionDenied,
      'not_a_participant',
      `${agentId} is not a participant of session "${session.id}"`,
      { agentId },
    );
  }
}
