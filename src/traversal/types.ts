import { z } from 'zod';
import type { BFSTraversal, Vertex } from '../graph/types.js';

export const TimedTraversalSchema = z.object({
  traversal: z.array(z.number().int().nonnegative()),
  elapsedMs: z.number().nonnegative(),
});

/** What one BFS task hands back to the pool */
export type TimedTraversal = z.infer<typeof TimedTraversalSchema>;

export const BfsWorkerDataSchema = z.object({
  matrix: z.array(z.array(z.number())),
});

export const BfsRequestSchema = z.object({
  type: z.literal('run'),
  task: z.number().int(),
});

export interface SingleVertexResult {
  start: Vertex;
  traversal: BFSTraversal;
  elapsedMs: number;
  /** Pool slot (1-based) that executed the traversal */
  workerId: number;
}

export interface AllVerticesResult {
  /** Correlates the log lines of one fan-out */
  runId: string;
  /** One entry per vertex, ascending by start vertex */
  results: readonly SingleVertexResult[];
  totalElapsedMs: number;
  workerCount: number;
}

export interface RunSummary {
  vertexCount: number;
  workerCount: number;
  workersUsed: number;
  totalElapsedMs: number;
  meanTaskMs: number;
  maxTaskMs: number;
  tasksPerWorker: Record<number, number>;
}
