import { InMemoryDocumentStore, silentLogger } from '@colloquy/core';
import { SessionStore } from '../src/index.js';
import type { CreateSessionParams } from '../src/index.js';

/** Fail the test unless the outcome is a success, narrowing it. */
export function expectOk<T extends { ok: boolean }>(outcome: T): asserts outcome is Extract<T, { ok: true }> {
  if (!outcome.ok) {
    throw new Error(`Expected success, got ${JSON.stringify(outcome)}`);
  }
}

export function memorySessionStore(): SessionStore {
  return new SessionStore(new InMemoryDocumentStore(), { logger: silentLogger });
}

export function bace1Session(overrides: Partial<CreateSessionParams> = {}): CreateSessionParams {
  return {
    createdBy: 'agent-a',
    topic: 'BACE1 investigation',
    description: 'Inhibitor candidates for beta-secretase 1',
    suggestedInvestigations: [
      { id: 'inv-structure', description: 'Binding pocket structure', neededSkills: ['pdb', 'uniprot'] },
      { id: 'inv-literature', description: 'Known inhibitors in the literature', neededSkills: ['pubmed'] },
      { id: 'inv-admet', description: 'ADMET profile of the top hits', neededSkills: ['tdc'] },
    ],
    maxParticipants: 4,
    ...overrides,
  };
}

export async function createSession(store: SessionStore, overrides: Partial<CreateSessionParams> = {}): Promise<string> {
  const created = await store.createSession(bace1Session(overrides));
  expectOk(created);
  return created.sessionId;
}
