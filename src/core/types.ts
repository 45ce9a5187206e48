import { z } from 'zod';

// ===== Configuration =====

export const TraversalModeSchema = z.enum(['in-process', 'thread']);
export type TraversalMode = z.infer<typeof TraversalModeSchema>;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const FanoutConfigSchema = z.object({
  traversal: z.object({
    workers: z.number().int().min(1).default(4),
    /**
     * - 'in-process': tasks share the event loop, one slot per worker id.
     * - 'thread': each worker id owns a worker_threads Worker running the compiled BFS worker.
     */
    mode: TraversalModeSchema.default('in-process'),
  }).default({}),
  logging: z.object({
    level: LogLevelSchema.default('info'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type FanoutConfig = z.infer<typeof FanoutConfigSchema>;

/** Loose input shape accepted by ConfigManager.load() overrides */
export type FanoutConfigInput = z.input<typeof FanoutConfigSchema>;
