/**
 * EventLog — append-only, session-scoped audit trail.
 *
 * Each session has its own `.colloquy/events/<session-id>.jsonl`; every
 * record is one JSON line written with a single synchronous append, so
 * concurrent appenders never interleave within a record. Records are
 * checked against coordination-event.schema.json on the way in and on the
 * way out; unreadable lines are skipped with a warning.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import fs from 'graceful-fs';
import { v4 as uuidv4 } from 'uuid';
import {
  ErrorKind,
  FileSystemError,
  collectSchemaIssues,
  compileSchema,
  createLogger,
  defaultConfig,
  failure,
  failureFromError,
  getEventLogPath,
  isJsonSerializable,
} from '@colloquy/core';
import type { ColloquyConfig, Failure, Logger } from '@colloquy/core';
import eventSchema from '../../schemas/coordination-event.schema.json' with { type: 'json' };
import { buildEvidenceTrail } from './evidence-trail.js';
import { computeLogConsensus } from './log-consensus.js';
import type {
  CoordinationEvent,
  CoordinationEventOf,
  CoordinationEventPayloads,
  CoordinationEventType,
  EventQuery,
  EvidenceChain,
  LogConsensusState,
  LogConsensusThresholds,
} from './types.js';

const isCoordinationEvent = compileSchema<CoordinationEvent>(eventSchema);

const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export type LogEventOutcome<T extends CoordinationEventType> =
  | { ok: true; event: CoordinationEventOf<T> }
  | Failure;

export type ReadEventsOutcome = { ok: true; events: CoordinationEvent[] } | Failure;

export type EvidenceChainOutcome = { ok: true; chain: EvidenceChain } | Failure;

export type LogConsensusOutcome = { ok: true; state: LogConsensusState } | Failure;

export interface EventLogOptions {
  config?: ColloquyConfig;
  logger?: Logger;
}

/** The agent that performed the event, if the event has one. */
export function eventAgent(event: CoordinationEvent): string | null {
  switch (event.event_type) {
    case 'SessionCreated':
      return event.payload.created_by;
    case 'AgentValidatedFinding':
      return event.payload.validator_agent;
    case 'AgentChallengedFinding':
      return event.payload.challenger_agent;
    case 'AgentJoinedSession':
    case 'AgentClaimedTask':
    case 'AgentStartedTask':
    case 'AgentCompletedTask':
    case 'AgentPostedFinding':
    case 'RoleAssigned':
      return event.payload.agent_name;
    case 'ConsensusReached':
    case 'DisagreementRecorded':
    case 'SessionCompleted':
      return null;
  }
}

/** The task (finding) an event refers to, if any. */
export function eventTask(event: CoordinationEvent): string | null {
  switch (event.event_type) {
    case 'AgentValidatedFinding':
      return event.payload.validated_task_id;
    case 'AgentChallengedFinding':
      return event.payload.challenged_task_id;
    case 'AgentClaimedTask':
    case 'AgentStartedTask':
    case 'AgentCompletedTask':
    case 'AgentPostedFinding':
    case 'ConsensusReached':
    case 'DisagreementRecorded':
      return event.payload.task_id;
    case 'SessionCreated':
    case 'AgentJoinedSession':
    case 'RoleAssigned':
    case 'SessionCompleted':
      return null;
  }
}

/** Apply an EventQuery; returns matching events in log order. */
export function filterEvents(events: readonly CoordinationEvent[], query: EventQuery = {}): CoordinationEvent[] {
  const start = query.timeRange?.start ? Date.parse(query.timeRange.start) : Number.NEGATIVE_INFINITY;
  const end = query.timeRange?.end ? Date.parse(query.timeRange.end) : Number.POSITIVE_INFINITY;

  return events.filter((event) => {
    if (query.eventTypes && !query.eventTypes.includes(event.event_type)) return false;
    if (query.agent !== undefined && eventAgent(event) !== query.agent) return false;
    if (query.task !== undefined && eventTask(event) !== query.task) return false;
    const at = Date.parse(event.timestamp);
    return at >= start && at <= end;
  });
}

export class EventLog {
  private readonly config: ColloquyConfig;
  private readonly logger: Logger;

  constructor(
    private readonly workspacePath: string,
    options: EventLogOptions = {},
  ) {
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? createLogger('event-log', { level: this.config.logging.level });
  }

  /** Path of a session's log file. */
  pathFor(sessionId: string): string {
    return getEventLogPath(this.workspacePath, sessionId);
  }

  /** Append one record. Prior records are never touched. */
  async logEvent<T extends CoordinationEventType>(
    sessionId: string,
    eventType: T,
    payload: CoordinationEventPayloads[T],
  ): Promise<LogEventOutcome<T>> {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      return failure(ErrorKind.InvalidInput, 'invalid_session_id', `Invalid session id "${sessionId}"`);
    }

    if (!isJsonSerializable(payload)) {
      return failure(ErrorKind.InvalidInput, 'unserializable_payload', `${eventType} payload must be JSON-serializable`);
    }

    const event: CoordinationEventOf<T> = {
      event_id: uuidv4(),
      timestamp: new Date().toISOString(),
      event_type: eventType,
      session_id: sessionId,
      payload,
    };

    const issues = collectSchemaIssues(event, eventSchema, 'coordination-event');
    if (issues.length > 0) {
      return failure(
        ErrorKind.InvalidInput,
        'schema_violation',
        `Invalid ${eventType} event: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
        { issues },
      );
    }

    const logPath = this.pathFor(sessionId);
    try {
      mkdirSync(dirname(logPath), { recursive: true });
      appendFileSync(logPath, JSON.stringify(event) + '\n', 'utf-8');
    } catch (err) {
      return failureFromError(
        new FileSystemError(
          `Failed to append to ${logPath}: ${err instanceof Error ? err.message : String(err)}`,
          logPath,
          err,
        ),
      );
    }

    this.logger.debug(`Logged ${eventType} for session ${sessionId}`);
    return { ok: true, event };
  }

  /** Every valid record of a session's log, in append order. A missing log is empty. */
  async readEvents(sessionId: string): Promise<ReadEventsOutcome> {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      return failure(ErrorKind.InvalidInput, 'invalid_session_id', `Invalid session id "${sessionId}"`);
    }

    const logPath = this.pathFor(sessionId);
    let content: string;
    try {
      content = await fs.promises.readFile(logPath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return { ok: true, events: [] };
      return failureFromError(
        new FileSystemError(
          `Failed to read ${logPath}: ${err instanceof Error ? err.message : String(err)}`,
          logPath,
          err,
        ),
      );
    }

    const events: CoordinationEvent[] = [];
    const lines = content.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim();
      if (!line) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        this.logger.warn(`Skipping unparsable line ${i + 1} of ${logPath}`);
        continue;
      }
      if (!isCoordinationEvent(parsed)) {
        this.logger.warn(`Skipping malformed event on line ${i + 1} of ${logPath}`);
        continue;
      }
      events.push(parsed);
    }
    return { ok: true, events };
  }

  /** Linear scan of a session's log through `filterEvents`. */
  async queryEvents(sessionId: string, query: EventQuery = {}): Promise<ReadEventsOutcome> {
    for (const bound of [query.timeRange?.start, query.timeRange?.end]) {
      if (bound && Number.isNaN(Date.parse(bound))) {
        return failure(ErrorKind.InvalidInput, 'invalid_time_range', `Unparsable timestamp "${bound}"`, { bound });
      }
    }
    const read = await this.readEvents(sessionId);
    if (!read.ok) return read;
    return { ok: true, events: filterEvents(read.events, query) };
  }

  /**
   * Rebuild the evidence chain of a task from its first AgentCompletedTask
   * record plus every validation and challenge that references it.
   */
  async getEvidenceChain(sessionId: string, taskId: string): Promise<EvidenceChainOutcome> {
    const read = await this.queryEvents(sessionId, { task: taskId });
    if (!read.ok) return read;

    const completion = read.events.find(
      (e): e is CoordinationEventOf<'AgentCompletedTask'> => e.event_type === 'AgentCompletedTask',
    );
    if (!completion) {
      return failure(
        ErrorKind.NotFound,
        'task_not_found',
        `No completion event for task "${taskId}" in session "${sessionId}"`,
        { sessionId, taskId },
      );
    }

    const { evidence } = completion.payload;
    const validations = read.events.filter(
      (e): e is CoordinationEventOf<'AgentValidatedFinding'> => e.event_type === 'AgentValidatedFinding',
    );
    const challenges = read.events.filter(
      (e): e is CoordinationEventOf<'AgentChallengedFinding'> => e.event_type === 'AgentChallengedFinding',
    );

    return {
      ok: true,
      chain: {
        taskId,
        conclusion: completion.payload.result,
        agent: completion.payload.agent_name,
        timestamp: completion.timestamp,
        evidenceTrail: buildEvidenceTrail(evidence.tool_outputs, evidence.reasoning_trace, evidence.confidence),
        validations: validations.map((e) => ({
          agent: e.payload.validator_agent,
          status: e.payload.validation_result.status,
          confidence: e.payload.validation_result.confidence,
          reasoning: e.payload.validation_result.reasoning,
        })),
        challenges: challenges.map((e) => ({
          agent: e.payload.challenger_agent,
          reasoning: e.payload.challenge_reasoning,
          alternative: e.payload.alternative_hypothesis,
          confidence: e.payload.confidence,
        })),
      },
    };
  }

  /** Log-level consensus over every completion, validation and challenge in the log. */
  async getConsensusState(
    sessionId: string,
    thresholds?: Partial<LogConsensusThresholds>,
  ): Promise<LogConsensusOutcome> {
    const read = await this.readEvents(sessionId);
    if (!read.ok) return read;
    return {
      ok: true,
      state: computeLogConsensus(read.events, {
        minValidations: thresholds?.minValidations ?? this.config.consensus.log_min_validations,
        confidenceThreshold: thresholds?.confidenceThreshold ?? this.config.consensus.log_confidence_threshold,
      }),
    };
  }
}
