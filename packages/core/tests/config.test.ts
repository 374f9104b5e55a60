import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import {
  ValidationError,
  defaultConfig,
  getConfigPath,
  initWorkspace,
  loadConfig,
  parseConfig,
} from '../src/index.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'colloquy-config-test-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function writeConfig(text: string): Promise<void> {
  await fs.mkdir(path.join(tmpDir, '.colloquy'), { recursive: true });
  await fs.writeFile(getConfigPath(tmpDir), text);
}

describe('defaultConfig', () => {
  it('spells out every default', () => {
    expect(defaultConfig()).toEqual({
      sessions: { max_participants: 5 },
      storage: { cas_max_retries: 8, cas_backoff_ms: 10, lock_stale_ms: 5000 },
      discovery: { default_availability: 'available', default_limit: 10, default_max_agents: 5 },
      consensus: { log_min_validations: 2, log_confidence_threshold: 0.8 },
      logging: { level: 'info' },
    });
  });
});

describe('parseConfig', () => {
  it('rejects unknown keys', () => {
    expect(() => parseConfig({ sessions: { max_members: 3 } })).toThrow(ValidationError);
  });

  it('rejects out-of-range values with the offending path in the message', () => {
    expect(() => parseConfig({ consensus: { log_confidence_threshold: 1.5 } })).toThrow(
      /consensus\.log_confidence_threshold/,
    );
  });
});

describe('loadConfig', () => {
  it('returns defaults when config.yaml does not exist', async () => {
    expect(await loadConfig(tmpDir)).toEqual(defaultConfig());
  });

  it('fills unspecified keys with defaults', async () => {
    await writeConfig('sessions:\n  max_participants: 8\nlogging:\n  level: warn\n');

    const config = await loadConfig(tmpDir);
    expect(config.sessions.max_participants).toBe(8);
    expect(config.logging.level).toBe('warn');
    expect(config.storage.cas_max_retries).toBe(8);
  });

  it('applies overrides section by section on top of the file', async () => {
    await writeConfig('storage:\n  cas_max_retries: 3\n  cas_backoff_ms: 50\n');

    const config = await loadConfig(tmpDir, { storage: { cas_backoff_ms: 0 } });
    expect(config.storage).toEqual({ cas_max_retries: 3, cas_backoff_ms: 0, lock_stale_ms: 5000 });
  });

  it('treats an empty file as all defaults', async () => {
    await writeConfig('');
    expect(await loadConfig(tmpDir)).toEqual(defaultConfig());
  });

  it('throws ValidationError for malformed YAML', async () => {
    await writeConfig('sessions: [unclosed\n');
    await expect(loadConfig(tmpDir)).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('initWorkspace', () => {
  it('creates the directory layout and a default config once', async () => {
    expect(await initWorkspace(tmpDir)).toBe(true);

    for (const dir of ['sessions', 'discovery', 'events']) {
      const stat = await fs.stat(path.join(tmpDir, '.colloquy', dir));
      expect(stat.isDirectory()).toBe(true);
    }
    expect(await loadConfig(tmpDir)).toEqual(defaultConfig());

    await writeConfig('sessions:\n  max_participants: 2\n');
    expect(await initWorkspace(tmpDir)).toBe(false);
    expect((await loadConfig(tmpDir)).sessions.max_participants).toBe(2);
  });

  it('skips the config file when asked', async () => {
    expect(await initWorkspace(tmpDir, { writeConfig: false })).toBe(false);
    await expect(fs.access(getConfigPath(tmpDir))).rejects.toThrow();
  });
});
