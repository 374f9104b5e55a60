/**
 * TransparencyApi — read-only projections over the session store and the
 * event log, for humans and tools inspecting how a conclusion was reached.
 *
 * Holds no state of its own and never writes. The session store is the
 * system of record; the event log is preferred only for evidence chains.
 */

import { ErrorKind, createLogger, failure, ownValue } from '@colloquy/core';
import type { Failure, Logger } from '@colloquy/core';
import { classifyFinding, summarizeConsensus } from '../session/consensus.js';
import type { ConsensusSummary, FindingClassification } from '../session/consensus.js';
import type { SessionStore } from '../session/session-store.js';
import type { Finding, Session, Validation, ValidationStatus } from '../session/types.js';
import type { EventLog } from '../events/event-log.js';
import { buildEvidenceTrail } from '../events/evidence-trail.js';
import type { EvidenceChain } from '../events/types.js';

/** Evidence chain plus where it was reconstructed from. */
export interface FindingEvidenceChain extends EvidenceChain {
  source: 'event_log' | 'session_store';
}

export interface FindingValidationsView {
  findingId: string;
  author: string;
  result: string;
  totalValidations: number;
  byStatus: Record<ValidationStatus, Validation[]>;
  classification: FindingClassification;
}

export interface AgentActivityView {
  agent: string;
  findingsPosted: number;
  findingIds: string[];
  validationsGiven: number;
  validationBreakdown: Record<ValidationStatus, number>;
  investigationsClaimed: string[];
  joinedAt: string | null;
}

export interface SessionConsensusView {
  sessionId: string;
  totalFindings: number;
  counts: ConsensusSummary['counts'];
  findingIds: ConsensusSummary['findingIds'];
  consensusRate: number;
  debateRate: number;
}

export const TimelineEntryType = {
  SessionCreated: 'session_created',
  AgentJoined: 'agent_joined',
  InvestigationClaimed: 'investigation_claimed',
  FindingPosted: 'finding_posted',
  Validation: 'validation',
  SessionCompleted: 'session_completed',
} as const;

export type TimelineEntryType = (typeof TimelineEntryType)[keyof typeof TimelineEntryType];

export interface TimelineEntry {
  timestamp: string;
  type: TimelineEntryType;
  actor: string;
  description: string;
  findingId?: string;
  status?: ValidationStatus;
}

export interface SessionTimelineView {
  sessionId: string;
  eventCount: number;
  events: TimelineEntry[];
}

export interface InvestigationStatusView {
  investigationId: string;
  description: string;
  neededSkills: string[];
  claimedBy: string | null;
  claimedAt: string | null;
  relatedFindings: string[];
  status: 'unclaimed' | 'in_progress' | 'completed';
}

export type QueryOutcome<T> = { ok: true; value: T } | Failure;

export interface TransparencyApiOptions {
  /** Optional audit trail; without it evidence chains come from the session store. */
  events?: EventLog | null;
  logger?: Logger;
}

const RESULT_PREVIEW_LENGTH = 80;

function emptyByStatus<T>(make: () => T): Record<ValidationStatus, T> {
  return { confirmed: make(), partial: make(), challenged: make(), inconclusive: make() };
}

function findingNotFound(sessionId: string, findingId: string): Failure {
  return failure(ErrorKind.NotFound, 'finding_not_found', `Finding "${findingId}" not found in session "${sessionId}"`, {
    sessionId,
    findingId,
  });
}

/** Evidence chain rebuilt directly from a stored finding. */
export function evidenceChainFromFinding(finding: Finding): EvidenceChain {
  return {
    taskId: finding.id,
    conclusion: finding.result,
    agent: finding.author,
    timestamp: finding.created_at,
    evidenceTrail: buildEvidenceTrail(finding.evidence.tool_outputs, finding.reasoning_trace, finding.confidence),
    validations: finding.validations
      .filter((v) => v.status !== 'challenged')
      .map((v) => ({ agent: v.validator, status: v.status, confidence: v.confidence, reasoning: v.reasoning })),
    challenges: finding.validations
      .filter((v) => v.status === 'challenged')
      .map((v) => ({ agent: v.validator, reasoning: v.reasoning, alternative: null, confidence: v.confidence })),
  };
}

export class TransparencyApi {
  private readonly events: EventLog | null;
  private readonly logger: Logger;

  constructor(
    private readonly sessions: SessionStore,
    options: TransparencyApiOptions = {},
  ) {
    this.events = options.events ?? null;
    this.logger = options.logger ?? createLogger('transparency');
  }

  /**
   * Evidence chain of a finding. Uses the event log when it has a
   * completion record for the finding, otherwise the stored finding.
   */
  async evidenceChain(sessionId: string, findingId: string): Promise<QueryOutcome<FindingEvidenceChain>> {
    if (this.events) {
      const fromLog = await this.events.getEvidenceChain(sessionId, findingId);
      if (fromLog.ok) {
        return { ok: true, value: { ...fromLog.chain, source: 'event_log' } };
      }
      if (fromLog.error !== ErrorKind.NotFound) {
        this.logger.warn(`Event log unavailable for ${sessionId} (${fromLog.message}); using session store`);
      }
    }

    const found = await this.loadFinding(sessionId, findingId);
    if (!found.ok) return found;
    return { ok: true, value: { ...evidenceChainFromFinding(found.finding), source: 'session_store' } };
  }

  /** Validations of a finding grouped by status, with its classification. */
  async findingValidations(sessionId: string, findingId: string): Promise<QueryOutcome<FindingValidationsView>> {
    const found = await this.loadFinding(sessionId, findingId);
    if (!found.ok) return found;

    const { finding } = found;
    const byStatus = emptyByStatus<Validation[]>(() => []);
    for (const v of finding.validations) byStatus[v.status].push(v);

    return {
      ok: true,
      value: {
        findingId,
        author: finding.author,
        result: finding.result,
        totalValidations: finding.validations.length,
        byStatus,
        classification: classifyFinding(finding.validations),
      },
    };
  }

  /** Everything one agent contributed to a session. */
  async agentActivity(sessionId: string, agentId: string): Promise<QueryOutcome<AgentActivityView>> {
    const loaded = await this.sessions.getSession(sessionId);
    if (!loaded.ok) return loaded;

    const { session } = loaded;
    const authored = session.findings.filter((f) => f.author === agentId);
    const given = session.findings.flatMap((f) => f.validations.filter((v) => v.validator === agentId));
    const breakdown = emptyByStatus(() => 0);
    for (const v of given) breakdown[v.status]++;

    return {
      ok: true,
      value: {
        agent: agentId,
        findingsPosted: authored.length,
        findingIds: authored.map((f) => f.id),
        validationsGiven: given.length,
        validationBreakdown: breakdown,
        investigationsClaimed: Object.entries(session.claimed_investigations)
          .filter(([, holder]) => holder === agentId)
          .map(([investigationId]) => investigationId),
        joinedAt: ownValue(session.timestamps.joined, agentId) ?? null,
      },
    };
  }

  /** Classification counts and rates, computed from the session store. */
  async sessionConsensus(sessionId: string): Promise<QueryOutcome<SessionConsensusView>> {
    const loaded = await this.sessions.getSession(sessionId);
    if (!loaded.ok) return loaded;

    const summary = summarizeConsensus(loaded.session.findings);
    return {
      ok: true,
      value: {
        sessionId,
        totalFindings: summary.totalFindings,
        counts: summary.counts,
        findingIds: summary.findingIds,
        consensusRate: summary.consensusRate,
        debateRate: summary.debateRate,
      },
    };
  }

  /** Creation, joins, claims, findings, validations and completion, oldest first. */
  async sessionTimeline(sessionId: string): Promise<QueryOutcome<SessionTimelineView>> {
    const loaded = await this.sessions.getSession(sessionId);
    if (!loaded.ok) return loaded;

    const events = buildTimeline(loaded.session);
    return { ok: true, value: { sessionId, eventCount: events.length, events } };
  }

  async investigationStatus(
    sessionId: string,
    investigationId: string,
  ): Promise<QueryOutcome<InvestigationStatusView>> {
    const loaded = await this.sessions.getSession(sessionId);
    if (!loaded.ok) return loaded;

    const { session } = loaded;
    const investigation = session.suggested_investigations.find((inv) => inv.id === investigationId);
    if (!investigation) {
      return failure(ErrorKind.NotFound, 'investigation_not_found', `Investigation "${investigationId}" not found`, {
        sessionId,
        investigationId,
      });
    }

    const claimedBy = ownValue(session.claimed_investigations, investigationId) ?? null;
    // Findings are not linked to investigations; the claimant's findings stand in.
    const relatedFindings = claimedBy
      ? session.findings.filter((f) => f.author === claimedBy).map((f) => f.id)
      : [];

    return {
      ok: true,
      value: {
        investigationId,
        description: investigation.description,
        neededSkills: [...investigation.needed_skills],
        claimedBy,
        claimedAt: ownValue(session.timestamps.claimed, investigationId) ?? null,
        relatedFindings,
        status: relatedFindings.length > 0 ? 'completed' : claimedBy ? 'in_progress' : 'unclaimed',
      },
    };
  }

  private async loadFinding(
    sessionId: string,
    findingId: string,
  ): Promise<{ ok: true; session: Session; finding: Finding } | Failure> {
    const loaded = await this.sessions.getSession(sessionId);
    if (!loaded.ok) return loaded;
    const finding = loaded.session.findings.find((f) => f.id === findingId);
    if (!finding) return findingNotFound(sessionId, findingId);
    return { ok: true, session: loaded.session, finding };
  }
}

function preview(text: string): string {
  return text.length > RESULT_PREVIEW_LENGTH ? `${text.slice(0, RESULT_PREVIEW_LENGTH)}...` : text;
}

/** Session history merged from the document's timestamps, stable-sorted by time. */
export function buildTimeline(session: Session): TimelineEntry[] {
  const entries: TimelineEntry[] = [
    {
      timestamp: session.created_at,
      type: 'session_created',
      actor: session.created_by,
      description: `Created session: ${session.topic}`,
    },
  ];

  for (const agent of session.participants) {
    const joinedAt = ownValue(session.timestamps.joined, agent);
    if (agent === session.created_by || !joinedAt) continue;
    entries.push({ timestamp: joinedAt, type: 'agent_joined', actor: agent, description: `${agent} joined session` });
  }

  for (const [investigationId, holder] of Object.entries(session.claimed_investigations)) {
    const claimedAt = ownValue(session.timestamps.claimed, investigationId);
    if (!claimedAt) continue;
    entries.push({
      timestamp: claimedAt,
      type: 'investigation_claimed',
      actor: holder,
      description: `Claimed investigation: ${investigationId}`,
    });
  }

  for (const finding of session.findings) {
    entries.push({
      timestamp: finding.created_at,
      type: 'finding_posted',
      actor: finding.author,
      description: `Posted finding: ${preview(finding.result)}`,
      findingId: finding.id,
    });
    for (const v of finding.validations) {
      entries.push({
        timestamp: v.created_at,
        type: 'validation',
        actor: v.validator,
        description: `${v.status} finding ${finding.id}`,
        findingId: finding.id,
        status: v.status,
      });
    }
  }

  if (session.completed_at) {
    entries.push({
      timestamp: session.completed_at,
      type: 'session_completed',
      actor: session.created_by,
      description: 'Session completed',
    });
  }

  return entries.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}
