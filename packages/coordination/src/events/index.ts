export { CoordinationEventType } from './types.js';
export type {
  CoordinationEvent,
  CoordinationEventOf,
  CoordinationEventPayloads,
  TaskEvidence,
  EventQuery,
  EvidenceTrailEntry,
  EvidenceChain,
  EvidenceChainValidation,
  EvidenceChainChallenge,
  LogConsensusState,
  LogConsensusThresholds,
} from './types.js';
export { EventLog, eventAgent, eventTask, filterEvents } from './event-log.js';
export type {
  EventLogOptions,
  LogEventOutcome,
  ReadEventsOutcome,
  EvidenceChainOutcome,
  LogConsensusOutcome,
} from './event-log.js';
export { buildEvidenceTrail, splitReasoningSteps } from './evidence-trail.js';
export { computeLogConsensus, DEFAULT_LOG_CONSENSUS_THRESHOLDS } from './log-consensus.js';
