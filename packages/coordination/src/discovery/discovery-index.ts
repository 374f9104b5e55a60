/**
 * DiscoveryIndex — shared skill/interest registry for agents and
 * broadcast sessions.
 *
 * The whole registry is a single versioned document updated through the
 * compare-and-swap loop. A missing or corrupt document is read as an empty
 * registry (with a warning) and replaced on the next write.
 */

import {
  ErrorKind,
  FileDocumentStore,
  createLogger,
  defaultConfig,
  failure,
  failureFromError,
  getDiscoveryDir,
  hasOwnKey,
  isReservedKey,
  ownValue,
  readDocument,
  updateDocument,
} from '@colloquy/core';
import type {
  ColloquyConfig,
  DocumentCodec,
  DocumentRead,
  DocumentStore,
  Failure,
  Logger,
  Mutation,
  UpdateOptions,
} from '@colloquy/core';
import { DiscoveryIndexSchema } from './types.js';
import type {
  AgentAvailability,
  AgentProfile,
  AgentRecord,
  BroadcastSession,
  BroadcastSessionParams,
  DiscoveryIndexDocument,
  DiscoveryStatus,
  FindAgentsByInterestOptions,
  FindAgentsBySkillOptions,
} from './types.js';
import { interestScore, overlap, phraseScore, rankByScore } from './scoring.js';

/** Document id of the registry inside the discovery directory. */
export const DISCOVERY_DOCUMENT_ID = 'index';

export const DISCOVERY_CODEC: DocumentCodec<DiscoveryIndexDocument> = {
  kind: 'discovery-index',
  schema: DiscoveryIndexSchema,
};

type IndexBody = Omit<DiscoveryIndexDocument, 'version'>;

export type RegisterAgentOutcome = { ok: true; status: 'registered'; agent: AgentRecord } | Failure;
export type UnregisterAgentOutcome = { ok: true; status: 'unregistered'; agent: AgentRecord } | Failure;
export type SetAgentStatusOutcome = { ok: true; status: 'updated'; agent: AgentRecord } | Failure;
export type BroadcastSessionOutcome = { ok: true; status: 'broadcast'; session: BroadcastSession } | Failure;
export type RemoveSessionOutcome = { ok: true; status: 'removed'; sessionId: string } | Failure;
export type AgentsOutcome = { ok: true; agents: AgentRecord[] } | Failure;
export type SessionsOutcome = { ok: true; sessions: BroadcastSession[] } | Failure;
export type DiscoveryStatusOutcome = { ok: true; status: DiscoveryStatus } | Failure;

export interface DiscoveryIndexOptions {
  config?: ColloquyConfig;
  logger?: Logger;
}

function emptyIndex(): IndexBody {
  return { agents: {}, skill_index: {}, active_sessions: {}, last_updated: new Date().toISOString() };
}

function bodyOf(read: DocumentRead<DiscoveryIndexDocument>): IndexBody {
  if (read.status !== 'ok') return emptyIndex();
  const { version: _version, ...body } = read.document;
  return body;
}

function uniqueSorted(values: readonly string[]): string[] {
  return [...new Set(values.filter((v) => v.length > 0))].sort();
}

/**
 * Remove `name` from every skill bucket, drop emptied buckets, then add it
 * under `skills`. Keeps skill_index the exact inverse of agents[*].skills.
 */
export function reindexAgent(
  skillIndex: Record<string, string[]>,
  name: string,
  skills: readonly string[],
): Record<string, string[]> {
  const next = new Map<string, string[]>();
  for (const [skill, names] of Object.entries(skillIndex)) {
    const kept = names.filter((n) => n !== name);
    if (kept.length > 0) next.set(skill, kept);
  }
  for (const skill of skills) {
    next.set(skill, uniqueSorted([...(next.get(skill) ?? []), name]));
  }
  return Object.fromEntries(next);
}

/** Skill index derived from scratch from the agents map. */
export function deriveSkillIndex(agents: Record<string, AgentRecord>): Record<string, string[]> {
  let index: Record<string, string[]> = {};
  for (const agent of Object.values(agents)) {
    index = reindexAgent(index, agent.name, agent.skills);
  }
  return index;
}

function reservedKey(kind: string, key: string): Failure {
  return failure(ErrorKind.InvalidInput, 'reserved_key', `"${key}" cannot be used as ${kind}`, { key });
}

function notFound(kind: 'agent' | 'session', id: string): Failure {
  return failure(ErrorKind.NotFound, `${kind}_not_found`, `No ${kind} "${id}" in the discovery index`, { id });
}

export class DiscoveryIndex {
  private readonly config: ColloquyConfig;
  private readonly logger: Logger;
  private readonly updateOptions: UpdateOptions;

  constructor(
    private readonly store: DocumentStore,
    options: DiscoveryIndexOptions = {},
  ) {
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? createLogger('discovery', { level: this.config.logging.level });
    this.updateOptions = {
      maxRetries: this.config.storage.cas_max_retries,
      backoffMs: this.config.storage.cas_backoff_ms,
      logger: this.logger,
    };
  }

  /** DiscoveryIndex over `<workspace>/.colloquy/discovery/index.json`. */
  static open(workspacePath: string, options: DiscoveryIndexOptions = {}): DiscoveryIndex {
    const config = options.config ?? defaultConfig();
    const store = new FileDocumentStore(getDiscoveryDir(workspacePath), {
      lock: { stale: config.storage.lock_stale_ms },
    });
    return new DiscoveryIndex(store, { ...options, config });
  }

  // ── Agents ────────────────────────────────────────────────────────

  /** Upsert an agent and re-file it under its current skills. */
  async registerAgent(
    name: string,
    profile: AgentProfile,
    status: AgentAvailability = 'available',
  ): Promise<RegisterAgentOutcome> {
    if (!name) return failure(ErrorKind.InvalidInput, 'missing_agent', 'Agent name is required');
    if (isReservedKey(name)) return reservedKey('an agent name', name);
    const reservedSkill = profile.skills.find(isReservedKey);
    if (reservedSkill !== undefined) return reservedKey('a skill', reservedSkill);

    const outcome = await this.mutate<RegisterAgentOutcome>((index) => {
      const now = new Date().toISOString();
      const agent: AgentRecord = {
        name,
        domain: profile.domain ?? 'mixed',
        skills: uniqueSorted(profile.skills),
        interests: uniqueSorted(profile.interests ?? []),
        status,
        curiosity_style: profile.curiosityStyle ?? 'explorer',
        last_heartbeat: now,
      };
      return {
        write: {
          ...index,
          agents: { ...index.agents, [name]: agent },
          skill_index: reindexAgent(index.skill_index, name, agent.skills),
          last_updated: now,
        },
        result: { ok: true, status: 'registered', agent },
      };
    });
    if (outcome.ok) {
      this.logger.debug(`Registered ${name} (${outcome.agent.skills.length} skills, ${status})`);
    }
    return outcome;
  }

  async unregisterAgent(name: string): Promise<UnregisterAgentOutcome> {
    return this.mutate<UnregisterAgentOutcome>((index) => {
      const agent = ownValue(index.agents, name);
      if (!agent) return { result: notFound('agent', name) };
      const { [name]: _removed, ...agents } = index.agents;
      return {
        write: {
          ...index,
          agents,
          skill_index: reindexAgent(index.skill_index, name, []),
          last_updated: new Date().toISOString(),
        },
        result: { ok: true, status: 'unregistered', agent },
      };
    });
  }

  /** Heartbeat status update; refreshes last_heartbeat. */
  async setAgentStatus(name: string, status: AgentAvailability): Promise<SetAgentStatusOutcome> {
    return this.mutate<SetAgentStatusOutcome>((index) => {
      const current = ownValue(index.agents, name);
      if (!current) return { result: notFound('agent', name) };
      const now = new Date().toISOString();
      const agent: AgentRecord = { ...current, status, last_heartbeat: now };
      return {
        write: { ...index, agents: { ...index.agents, [name]: agent }, last_updated: now },
        result: { ok: true, status: 'updated', agent },
      };
    });
  }

  // ── Sessions ──────────────────────────────────────────────────────

  async broadcastSession(sessionId: string, params: BroadcastSessionParams): Promise<BroadcastSessionOutcome> {
    if (!sessionId) return failure(ErrorKind.InvalidInput, 'missing_session', 'Session id is required');
    if (isReservedKey(sessionId)) return reservedKey('a session id', sessionId);
    if (params.suggestionCount !== undefined && !(Number.isInteger(params.suggestionCount) && params.suggestionCount >= 0)) {
      return failure(
        ErrorKind.InvalidInput,
        'invalid_suggestion_count',
        `suggestionCount must be a non-negative integer, got ${params.suggestionCount}`,
      );
    }

    const suggestions = params.suggestedInvestigations ?? [];
    const neededSkills = params.neededSkills
      ? [...params.neededSkills]
      : uniqueSorted(suggestions.flatMap((inv) => inv.neededSkills ?? []));

    const outcome = await this.mutate<BroadcastSessionOutcome>((index) => {
      const now = new Date().toISOString();
      const session: BroadcastSession = {
        session_id: sessionId,
        topic: params.topic,
        investigation_type: params.investigationType ?? 'multi-agent',
        needed_skills: neededSkills,
        suggestion_count: params.suggestionCount ?? suggestions.length,
        created_at: now,
      };
      return {
        write: {
          ...index,
          active_sessions: { ...index.active_sessions, [sessionId]: session },
          last_updated: now,
        },
        result: { ok: true, status: 'broadcast', session },
      };
    });
    if (outcome.ok) {
      this.logger.info(`Broadcast session ${sessionId} "${params.topic}" needing [${neededSkills.join(', ')}]`);
    }
    return outcome;
  }

  async removeSession(sessionId: string): Promise<RemoveSessionOutcome> {
    return this.mutate<RemoveSessionOutcome>((index) => {
      if (!hasOwnKey(index.active_sessions, sessionId)) return { result: notFound('session', sessionId) };
      const { [sessionId]: _removed, ...activeSessions } = index.active_sessions;
      return {
        write: { ...index, active_sessions: activeSessions, last_updated: new Date().toISOString() },
        result: { ok: true, status: 'removed', sessionId },
      };
    });
  }

  // ── Queries ───────────────────────────────────────────────────────

  /**
   * Agents holding every skill in `skills` (AND semantics), ranked by how
   * many of the requested and preferred skills they have. An empty skill
   * list matches nobody.
   */
  async findAgentsBySkill(skills: readonly string[], options: FindAgentsBySkillOptions = {}): Promise<AgentsOutcome> {
    const read = await this.read();
    if (!read.ok) return read;
    if (skills.length === 0) return { ok: true, agents: [] };

    const { index } = read;
    const exclude = new Set(options.exclude ?? []);
    const availability =
      options.availability === undefined ? this.config.discovery.default_availability : options.availability;

    let candidates: Set<string> | null = null;
    for (const skill of skills) {
      const holders = new Set(ownValue(index.skill_index, skill) ?? []);
      candidates = candidates === null ? holders : new Set([...candidates].filter((n: string) => holders.has(n)));
    }

    const matches = [...(candidates ?? [])]
      .sort()
      .flatMap((name) => {
        const agent = ownValue(index.agents, name);
        return agent ? [agent] : [];
      })
      .filter((agent) => !exclude.has(agent.name))
      .filter((agent) => availability === null || agent.status === availability);

    const wanted = new Set([...skills, ...(options.preferred ?? [])]);
    return { ok: true, agents: rankByScore(matches, (agent) => overlap(agent.skills, wanted)) };
  }

  /** Agents whose interests match `topic`, best first. */
  async findAgentsByInterest(topic: string, options: FindAgentsByInterestOptions = {}): Promise<AgentsOutcome> {
    const read = await this.read();
    if (!read.ok) return read;

    const exclude = new Set(options.exclude ?? []);
    const agents = Object.values(read.index.agents).filter((agent) => !exclude.has(agent.name));
    return {
      ok: true,
      agents: rankByScore(
        agents,
        (agent) => interestScore(agent.interests, topic),
        options.maxAgents ?? this.config.discovery.default_max_agents,
      ),
    };
  }

  /** Broadcast sessions needing any of `skills`, most overlap first. */
  async findSessionsBySkill(skills: readonly string[], limit?: number): Promise<SessionsOutcome> {
    const read = await this.read();
    if (!read.ok) return read;

    const have = new Set(skills);
    return {
      ok: true,
      sessions: rankByScore(
        Object.values(read.index.active_sessions),
        (session) => overlap(session.needed_skills, have),
        limit ?? this.config.discovery.default_limit,
      ),
    };
  }

  /** Broadcast sessions whose topic matches `topic`, best first. */
  async findSessionsByInterest(topic: string, limit?: number): Promise<SessionsOutcome> {
    const read = await this.read();
    if (!read.ok) return read;

    return {
      ok: true,
      sessions: rankByScore(
        Object.values(read.index.active_sessions),
        (session) => phraseScore(topic, session.topic),
        limit ?? this.config.discovery.default_limit,
      ),
    };
  }

  async listAgents(): Promise<AgentsOutcome> {
    const read = await this.read();
    if (!read.ok) return read;
    return {
      ok: true,
      agents: Object.values(read.index.agents).sort((a, b) => a.name.localeCompare(b.name)),
    };
  }

  async listActiveSessions(): Promise<SessionsOutcome> {
    const read = await this.read();
    if (!read.ok) return read;
    return { ok: true, sessions: Object.values(read.index.active_sessions) };
  }

  /** Skill index as currently stored. */
  async getSkillIndex(): Promise<{ ok: true; skillIndex: Record<string, string[]> } | Failure> {
    const read = await this.read();
    if (!read.ok) return read;
    return { ok: true, skillIndex: read.index.skill_index };
  }

  async getDiscoveryStatus(): Promise<DiscoveryStatusOutcome> {
    const read = await this.read();
    if (!read.ok) return read;
    const { index } = read;
    const agents = Object.values(index.agents);
    return {
      ok: true,
      status: {
        totalAgents: agents.length,
        availableAgents: agents.filter((a) => a.status === 'available').length,
        totalSkills: Object.keys(index.skill_index).length,
        totalSessions: Object.keys(index.active_sessions).length,
        lastUpdated: read.stored ? index.last_updated : null,
      },
    };
  }

  // ── Internals ─────────────────────────────────────────────────────

  private async read(): Promise<{ ok: true; index: IndexBody; stored: boolean } | Failure> {
    try {
      const read = await readDocument(this.store, DISCOVERY_DOCUMENT_ID, DISCOVERY_CODEC, this.logger);
      return { ok: true, index: bodyOf(read), stored: read.status === 'ok' };
    } catch (err) {
      return failureFromError(err);
    }
  }

  private async mutate<R extends { ok: boolean }>(
    apply: (index: IndexBody) => Mutation<DiscoveryIndexDocument, R>,
  ): Promise<R | Failure> {
    try {
      return await updateDocument<DiscoveryIndexDocument, R>(
        this.store,
        DISCOVERY_DOCUMENT_ID,
        DISCOVERY_CODEC,
        (current) => apply(bodyOf(current)),
        this.updateOptions,
      );
    } catch (err) {
      return failureFromError(err);
    }
  }
}
