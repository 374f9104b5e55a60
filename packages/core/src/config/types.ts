import { z } from 'zod';

/** Zod schema for .colloquy/config.yaml. Every key is optional. */
export const ColloquyConfigSchema = z.object({
  sessions: z.object({
    max_participants: z.number().int().min(1).default(5),
  }).strict().default({}),
  storage: z.object({
    cas_max_retries: z.number().int().min(0).default(8),
    cas_backoff_ms: z.number().int().min(0).default(10),
    lock_stale_ms: z.number().int().min(1000).default(5000),
  }).strict().default({}),
  discovery: z.object({
    default_availability: z.enum(['available', 'busy', 'investigating']).default('available'),
    default_limit: z.number().int().min(1).default(10),
    default_max_agents: z.number().int().min(1).default(5),
  }).strict().default({}),
  consensus: z.object({
    log_min_validations: z.number().int().min(1).default(2),
    log_confidence_threshold: z.number().min(0).max(1).default(0.8),
  }).strict().default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  }).strict().default({}),
}).strict();

/** Fully-resolved configuration (defaults applied). */
export type ColloquyConfig = z.infer<typeof ColloquyConfigSchema>;

/** Shape accepted in config.yaml before defaults are applied. */
export type ColloquyConfigInput = z.input<typeof ColloquyConfigSchema>;
