export {
  SessionStatus,
  ValidationStatus,
  SessionSchema,
  FindingSchema,
  ValidationSchema,
  EvidenceSchema,
  InvestigationSchema,
} from './types.js';
export type {
  Session,
  Finding,
  Validation,
  Evidence,
  Investigation,
  CreateSessionParams,
  PostFindingParams,
  ValidateFindingParams,
  SessionSummary,
} from './types.js';
export {
  FindingClassification,
  CLASSIFICATION_TRANSITIONS,
  advanceClassification,
  classifyFinding,
  summarizeConsensus,
} from './consensus.js';
export type { ConsensusSummary } from './consensus.js';
export { SessionStore, SESSION_CODEC } from './session-store.js';
export type {
  SessionStoreOptions,
  SessionState,
  SessionProgress,
  CreateSessionOutcome,
  JoinSessionOutcome,
  ClaimInvestigationOutcome,
  PostFindingOutcome,
  ValidateFindingOutcome,
  CompleteSessionOutcome,
  AbandonSessionOutcome,
  GetSessionOutcome,
  SessionStateOutcome,
  ListSessionsOutcome,
  AvailableInvestigationsOutcome,
} from './session-store.js';
