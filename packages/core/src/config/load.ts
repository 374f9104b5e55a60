import fs from 'graceful-fs';
import { parse as parseYaml } from 'yaml';
import { getConfigPath } from '../utils/paths.js';
import { FileSystemError, ValidationError } from '../errors.js';
import { ColloquyConfigSchema } from './types.js';
import type { ColloquyConfig, ColloquyConfigInput } from './types.js';

const fsPromises = fs.promises;

/** Configuration with every default applied. */
export function defaultConfig(): ColloquyConfig {
  return ColloquyConfigSchema.parse({});
}

/**
 * Validate a raw configuration object (e.g. parsed YAML or test overrides).
 *
 * @throws {ValidationError} If any key has the wrong type or is unknown
 */
export function parseConfig(raw: unknown, source = 'config'): ColloquyConfig {
  const result = ColloquyConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '/',
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid configuration in ${source}: ${details.map((d) => `${d.path}: ${d.message}`).join('; ')}`,
      source,
      details,
    );
  }
  return result.data;
}

/**
 * Load .colloquy/config.yaml from a workspace. A missing file yields defaults.
 *
 * @throws {ValidationError} If the YAML is malformed or fails the schema
 * @throws {FileSystemError} If the file exists but cannot be read
 */
export async function loadConfig(
  workspacePath: string,
  overrides: ColloquyConfigInput = {},
): Promise<ColloquyConfig> {
  const configPath = getConfigPath(workspacePath);
  let text: string | null = null;
  try {
    text = await fsPromises.readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw new FileSystemError(
        `Failed to read ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
        configPath,
        err,
      );
    }
  }

  let raw: unknown = {};
  if (text !== null) {
    try {
      raw = parseYaml(text) ?? {};
    } catch (err) {
      throw new ValidationError(
        `Malformed YAML in ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
        configPath,
      );
    }
  }

  return parseConfig(mergeSections(raw, overrides), configPath);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Shallow-merge each top-level section of `overrides` over `raw`. */
function mergeSections(raw: unknown, overrides: ColloquyConfigInput): unknown {
  if (!isRecord(raw)) return raw;
  const merged: Record<string, unknown> = { ...raw };
  for (const [section, values] of Object.entries(overrides)) {
    const base = merged[section];
    merged[section] = isRecord(base) && isRecord(values) ? { ...base, ...values } : values;
  }
  return merged;
}
