export { ColloquyConfigSchema } from './types.js';
export type { ColloquyConfig, ColloquyConfigInput } from './types.js';
export { defaultConfig, parseConfig, loadConfig } from './load.js';
