import { z } from 'zod';

/**
 * One execution slot of a WorkerPool. A slot runs at most one task at a time;
 * the pool never calls run() on a busy slot.
 */
export interface WorkerSlot<TTask, TResult> {
  readonly workerId: number;
  run(task: TTask): Promise<TResult>;
  close(): Promise<void>;
}

export type SlotFactory<TTask, TResult> = (workerId: number) => WorkerSlot<TTask, TResult>;

export interface PoolOptions {
  maxWorkers: number;
  /** Label used in log lines */
  name?: string;
}

export interface PoolStats {
  totalWorkers: number;
  busyWorkers: number;
  idleWorkers: number;
  pendingTasks: number;
  completedTasks: number;
  failedTasks: number;
}

export interface CompletedTask<TResult> {
  workerId: number;
  result: TResult;
}

// ===== Thread slot wire protocol =====

export interface SlotRequest<TTask> {
  type: 'run';
  task: TTask;
}

export const SlotReplySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('result'), payload: z.unknown() }),
  z.object({ type: z.literal('error'), message: z.string() }),
]);

export type SlotReply = z.infer<typeof SlotReplySchema>;
