export { AgentAvailability, AgentRecordSchema, BroadcastSessionSchema, DiscoveryIndexSchema } from './types.js';
export type {
  AgentRecord,
  AgentProfile,
  BroadcastSession,
  BroadcastSessionParams,
  DiscoveryIndexDocument,
  DiscoveryStatus,
  FindAgentsBySkillOptions,
  FindAgentsByInterestOptions,
} from './types.js';
export { phraseScore, interestScore, overlap, rankByScore } from './scoring.js';
export {
  DiscoveryIndex,
  DISCOVERY_CODEC,
  DISCOVERY_DOCUMENT_ID,
  reindexAgent,
  deriveSkillIndex,
} from './discovery-index.js';
export type {
  DiscoveryIndexOptions,
  RegisterAgentOutcome,
  UnregisterAgentOutcome,
  SetAgentStatusOutcome,
  BroadcastSessionOutcome,
  RemoveSessionOutcome,
  AgentsOutcome,
  SessionsOutcome,
  DiscoveryStatusOutcome,
} from './discovery-index.js';
