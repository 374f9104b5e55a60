/**
 * Workspace initialization — creates the .colloquy/ directory tree.
 *
 * Stores create their directories lazily, so this is only needed when a
 * deployment wants the layout (and a starter config.yaml) up front.
 */

import fs from 'graceful-fs';
import { stringify as stringifyYaml } from 'yaml';
import {
  getColloquyRoot,
  getConfigPath,
  getDiscoveryDir,
  getEventsDir,
  getSessionsDir,
} from './utils/paths.js';
import { defaultConfig } from './config/load.js';

const fsPromises = fs.promises;

export interface InitOptions {
  /** Write config.yaml with every default spelled out (default: true). Never overwrites. */
  writeConfig?: boolean;
}

/**
 * Create the full .colloquy/ directory structure.
 *
 * @returns True if a config.yaml was written by this call
 */
export async function initWorkspace(workspacePath: string, options: InitOptions = {}): Promise<boolean> {
  const dirs = [
    getColloquyRoot(workspacePath),
    getSessionsDir(workspacePath),
    getDiscoveryDir(workspacePath),
    getEventsDir(workspacePath),
  ];

  for (const dir of dirs) {
    await fsPromises.mkdir(dir, { recursive: true });
  }

  if (options.writeConfig === false) return false;
  try {
    await fsPromises.writeFile(getConfigPath(workspacePath), stringifyYaml(defaultConfig()), { flag: 'wx' });
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'EEXIST') return false;
    throw err;
  }
}
