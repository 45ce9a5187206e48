/**
 * Bounded Worker Pool
 * Runs at most `maxWorkers` tasks at once; extra tasks wait in FIFO order.
 * Each dispatched task is pinned to a numbered slot (1..maxWorkers) whose
 * id is reported back with the result.
 */

import { EventEmitter } from 'events';
import { getLogger } from '../core/logger.js';
import { PoolError, toError } from '../core/errors.js';
import type { CompletedTask, PoolOptions, PoolStats, SlotFactory, WorkerSlot } from './types.js';

interface QueueItem<TTask, TResult> {
  task: TTask;
  resolve: (completed: CompletedTask<TResult>) => void;
  reject: (error: Error) => void;
}

export class WorkerPool<TTask, TResult> extends EventEmitter {
  private readonly options: Required<PoolOptions>;
  private readonly slots = new Map<number, WorkerSlot<TTask, TResult>>();
  private idleWorkerIds: number[];
  private pendingQueue: QueueItem<TTask, TResult>[] = [];
  /** Dispatched tasks, each settled once its slot has answered */
  private readonly dispatched = new Set<Promise<void>>();
  private activeTasks = 0;
  private completedTasks = 0;
  private failedTasks = 0;
  private isShutdown = false;

  constructor(
    options: PoolOptions,
    private readonly createSlot: SlotFactory<TTask, TResult>,
  ) {
    super();
    if (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1) {
      throw new PoolError(`Pool size must be an integer of at least 1, got ${options.maxWorkers}`);
    }
    this.options = { maxWorkers: options.maxWorkers, name: options.name ?? 'pool' };
    this.idleWorkerIds = Array.from({ length: options.maxWorkers }, (_, i) => i + 1);

    getLogger().debug({ pool: this.options.name, maxWorkers: this.options.maxWorkers }, 'Worker pool initialized');
  }

  /**
   * Submit a task for execution.
   */
  async submit(task: TTask): Promise<CompletedTask<TResult>> {
    if (this.isShutdown) {
      throw new PoolError('Pool is shut down');
    }

    return new Promise((resolve, reject) => {
      this.pendingQueue.push({ task, resolve, reject });
      this.processQueue();
    });
  }

  /**
   * Submit multiple tasks; results come back in submission order.
   */
  async submitBatch(tasks: readonly TTask[]): Promise<CompletedTask<TResult>[]> {
    return Promise.all(tasks.map((task) => this.submit(task)));
  }

  getStats(): PoolStats {
    return {
      totalWorkers: this.options.maxWorkers,
      busyWorkers: this.activeTasks,
      idleWorkers: this.options.maxWorkers - this.activeTasks,
      pendingTasks: this.pendingQueue.length,
      completedTasks: this.completedTasks,
      failedTasks: this.failedTasks,
    };
  }

  get shutDown(): boolean {
    return this.isShutdown;
  }

  /**
   * Reject pending tasks, close every slot that was started, and wait for
   * every dispatched task to settle.
   */
  async shutdown(): Promise<void> {
    if (this.isShutdown) return;
    this.isShutdown = true;

    for (const pending of this.pendingQueue) {
      pending.reject(new PoolError('Pool shutting down'));
    }
    this.pendingQueue = [];

    const slots = [...this.slots.values()];
    this.slots.clear();
    const closed = await Promise.allSettled(slots.map((slot) => slot.close()));
    const failures = closed.filter((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    await Promise.allSettled([...this.dispatched]);

    getLogger().debug({ pool: this.options.name, slots: slots.length }, 'Worker pool shut down');

    if (failures.length > 0) {
      throw new PoolError(`Failed to close ${failures.length} worker slot(s)`, toError(failures[0].reason));
    }
  }

  private processQueue(): void {
    while (this.pendingQueue.length > 0 && this.idleWorkerIds.length > 0 && !this.isShutdown) {
      const item = this.pendingQueue.shift();
      const workerId = this.idleWorkerIds.shift();
      if (item === undefined || workerId === undefined) return;

      this.activeTasks++;
      let slot: WorkerSlot<TTask, TResult>;
      try {
        slot = this.getSlot(workerId);
      } catch (error) {
        this.release(workerId);
        this.failedTasks++;
        item.reject(new PoolError(`Could not start worker ${workerId}`, toError(error)));
        continue;
      }

      const done: Promise<void> = slot.run(item.task).then(
        (result) => {
          this.dispatched.delete(done);
          this.release(workerId);
          this.completedTasks++;
          this.emit('task:complete', { workerId });
          item.resolve({ workerId, result });
          this.processQueue();
        },
        (error: unknown) => {
          this.dispatched.delete(done);
          this.release(workerId);
          this.failedTasks++;
          const err = toError(error);
          this.emit('task:error', { workerId, error: err });
          item.reject(err);
          this.processQueue();
        },
      );
      this.dispatched.add(done);
    }
  }

  private getSlot(workerId: number): WorkerSlot<TTask, TResult> {
    let slot = this.slots.get(workerId);
    if (!slot) {
      slot = this.createSlot(workerId);
      this.slots.set(workerId, slot);
    }
    return slot;
  }

  private release(workerId: number): void {
    this.activeTasks--;
    // Lowest free id first keeps assignment stable across runs
    this.idleWorkerIds.push(workerId);
    this.idleWorkerIds.sort((a, b) => a - b);
  }
}

/**
 * Scoped pool: created for the duration of `fn` and always shut down afterwards.
 */
export async function withPool<TTask, TResult, T>(
  options: PoolOptions,
  createSlot: SlotFactory<TTask, TResult>,
  fn: (pool: WorkerPool<TTask, TResult>) => Promise<T>,
): Promise<T> {
  const pool = new WorkerPool(options, createSlot);
  try {
    return await fn(pool);
  } finally {
    await pool.shutdown();
  }
}
