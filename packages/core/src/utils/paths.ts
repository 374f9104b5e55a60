import path from 'node:path';

/**
 * Path resolution for the .colloquy directory structure.
 * All paths are resolved relative to a workspace root shared by the agents.
 */

/** @returns Root .colloquy directory path */
export function getColloquyRoot(workspacePath: string): string {
  return path.join(workspacePath, '.colloquy');
}

/** @returns Directory holding one JSON document per session */
export function getSessionsDir(workspacePath: string): string {
  return path.join(getColloquyRoot(workspacePath), 'sessions');
}

/** @returns Directory holding the shared discovery index */
export function getDiscoveryDir(workspacePath: string): string {
  return path.join(getColloquyRoot(workspacePath), 'discovery');
}

/** @returns Directory holding one append-only JSONL log per session */
export function getEventsDir(workspacePath: string): string {
  return path.join(getColloquyRoot(workspacePath), 'events');
}

/** @returns Path to a session's event log */
export function getEventLogPath(workspacePath: string, sessionId: string): string {
  return path.join(getEventsDir(workspacePath), `${sessionId}.jsonl`);
}

/** @returns Path to config.yaml */
export function getConfigPath(workspacePath: string): string {
  return path.join(getColloquyRoot(workspacePath), 'config.yaml');
}
