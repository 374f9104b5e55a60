/**
 * @colloquy/coordination — shared investigation sessions, agent discovery,
 * the coordination event log and the transparency queries built on them.
 */

// ── Sessions ────────────────────────────────────────────────────────
export * from './session/index.js';
export { SessionRecorder } from './session/recorder.js';
export type { SessionRecorderOptions, RecordContext } from './session/recorder.js';

// ── Discovery ───────────────────────────────────────────────────────
export * from './discovery/index.js';

// ── Event Log ───────────────────────────────────────────────────────
export * from './events/index.js';

// ── Transparency ────────────────────────────────────────────────────
export {
  TransparencyApi,
  TimelineEntryType,
  buildTimeline,
  evidenceChainFromFinding,
} from './transparency/query-api.js';
export type {
  FindingEvidenceChain,
  FindingValidationsView,
  AgentActivityView,
  SessionConsensusView,
  TimelineEntry,
  SessionTimelineView,
  InvestigationStatusView,
  QueryOutcome,
  TransparencyApiOptions,
} from './transparency/query-api.js';

// ── Agent Heartbeat ─────────────────────────────────────────────────
export { HeartbeatCoordinator } from './agent/heartbeat.js';
export type { HeartbeatCoordinatorConfig, HeartbeatReport } from './agent/heartbeat.js';
export type {
  AgentIdentity,
  CandidateSession,
  DecisionContext,
  Decision,
  Decide,
  SessionPublisher,
} from './agent/ports.js';
