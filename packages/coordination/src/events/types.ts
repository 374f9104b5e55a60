import type { ValidationStatus } from '../session/types.js';

/** Event type values matching coordination-event.schema.json enum. */
export const CoordinationEventType = {
  SessionCreated: 'SessionCreated',
  AgentJoinedSession: 'AgentJoinedSession',
  AgentClaimedTask: 'AgentClaimedTask',
  AgentStartedTask: 'AgentStartedTask',
  AgentCompletedTask: 'AgentCompletedTask',
  AgentPostedFinding: 'AgentPostedFinding',
  AgentValidatedFinding: 'AgentValidatedFinding',
  AgentChallengedFinding: 'AgentChallengedFinding',
  RoleAssigned: 'RoleAssigned',
  ConsensusReached: 'ConsensusReached',
  DisagreementRecorded: 'DisagreementRecorded',
  SessionCompleted: 'SessionCompleted',
} as const;

export type CoordinationEventType = (typeof CoordinationEventType)[keyof typeof CoordinationEventType];

/** Evidence attached to a completed task. */
export interface TaskEvidence {
  tool_outputs: Record<string, unknown>;
  tool_params: Record<string, unknown>;
  reasoning_trace: string;
  confidence: number;
  sources: string[];
}

/** Payload shape per event type. */
export interface CoordinationEventPayloads {
  SessionCreated: {
    topic: string;
    description: string;
    created_by: string;
    strategy: Record<string, unknown>;
  };
  AgentJoinedSession: {
    agent_name: string;
    reasoning: string;
    skill_match: Record<string, unknown>;
  };
  AgentClaimedTask: {
    task_id: string;
    agent_name: string;
    role: string;
    reasoning: string;
  };
  AgentStartedTask: {
    task_id: string;
    agent_name: string;
    plan: Record<string, unknown>;
  };
  AgentCompletedTask: {
    task_id: string;
    agent_name: string;
    result: string;
    evidence: TaskEvidence;
  };
  AgentPostedFinding: {
    agent_name: string;
    task_id: string;
    finding_summary: string;
    confidence: number;
  };
  AgentValidatedFinding: {
    validator_agent: string;
    validated_task_id: string;
    validation_result: {
      status: ValidationStatus;
      confidence: number;
      reasoning: string;
      method?: string;
    };
  };
  AgentChallengedFinding: {
    challenger_agent: string;
    challenged_task_id: string;
    challenge_reasoning: string;
    alternative_hypothesis: string | null;
    confidence: number;
  };
  RoleAssigned: {
    agent_name: string;
    role: string;
    reasoning: string;
    responsibilities: string;
  };
  ConsensusReached: {
    task_id: string;
    consensus_statement: string;
    validators: string[];
    confidence: number;
  };
  DisagreementRecorded: {
    task_id: string;
    agent_names: string[];
    disagreement_type: string;
    description: string;
  };
  SessionCompleted: {
    summary: string;
    result_post_id: string | null;
  };
}

/** One record of a session's event log. */
export interface CoordinationEventOf<T extends CoordinationEventType> {
  event_id: string;
  timestamp: string;
  event_type: T;
  session_id: string;
  payload: CoordinationEventPayloads[T];
}

/** Any event record, discriminated by `event_type`. */
export type CoordinationEvent = {
  [K in CoordinationEventType]: CoordinationEventOf<K>;
}[CoordinationEventType];

/** Filters for querying a session's events. All given filters must match. */
export interface EventQuery {
  eventTypes?: CoordinationEventType[];
  /** Matches the acting agent (agent_name, validator_agent or challenger_agent). */
  agent?: string;
  /** Matches the referenced task (task_id, validated_task_id or challenged_task_id). */
  task?: string;
  /** Inclusive ISO-8601 bounds. */
  timeRange?: { start?: string; end?: string };
}

/** A discrete step of the path from raw evidence to a conclusion. */
export type EvidenceTrailEntry =
  | { type: 'tool_output'; tool: string; result: unknown }
  | { type: 'reasoning'; step: string; confidence: number };

export interface EvidenceChainValidation {
  agent: string;
  status: ValidationStatus;
  confidence: number;
  reasoning: string;
}

export interface EvidenceChainChallenge {
  agent: string;
  reasoning: string;
  alternative: string | null;
  confidence: number;
}

/** Reconstructed trail from tool output and reasoning to a stated conclusion. */
export interface EvidenceChain {
  taskId: string;
  conclusion: string;
  agent: string;
  timestamp: string;
  evidenceTrail: EvidenceTrailEntry[];
  validations: EvidenceChainValidation[];
  challenges: EvidenceChainChallenge[];
}

/** Log-level consensus view; see `computeLogConsensus`. */
export interface LogConsensusState {
  totalFindings: number;
  validated: number;
  challenged: number;
  disputed: number;
  underReview: number;
  consensusRate: number;
}

export interface LogConsensusThresholds {
  /** Validation events that make a finding supported on their own (default: 2). */
  minValidations: number;
  /** A single validation at or above this confidence also suffices (default: 0.8). */
  confidenceThreshold: number;
}
