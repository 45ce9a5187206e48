/**
 * Worker slot implementations.
 * - InProcessSlot: runs the handler on the main event loop after yielding once.
 * - ThreadSlot: owns a long-lived worker_threads Worker and exchanges
 *   SlotRequest / SlotReply messages with it.
 */

import { Worker } from 'worker_threads';
import type { z } from 'zod';
import { PoolError, toError } from '../core/errors.js';
import { SlotReplySchema, type SlotRequest, type WorkerSlot } from './types.js';

export type SlotHandler<TTask, TResult> = (task: TTask, workerId: number) => TResult | Promise<TResult>;

export class InProcessSlot<TTask, TResult> implements WorkerSlot<TTask, TResult> {
  /** Scheduled tasks whose handler has not started yet */
  private readonly scheduled = new Map<NodeJS.Immediate, (error: Error) => void>();
  private closed = false;

  constructor(
    readonly workerId: number,
    private readonly handler: SlotHandler<TTask, TResult>,
  ) {}

  run(task: TTask): Promise<TResult> {
    if (this.closed) {
      return Promise.reject(new PoolError(`Worker ${this.workerId} is closed`));
    }

    return new Promise<TResult>((resolve, reject) => {
      const handle = setImmediate(() => {
        this.scheduled.delete(handle);
        Promise.resolve()
          .then(() => this.handler(task, this.workerId))
          .then(resolve, reject);
      });
      this.scheduled.set(handle, reject);
    });
  }

  /**
   * Cancels tasks that have not started. A handler already running is left
   * to settle on its own.
   */
  async close(): Promise<void> {
    this.closed = true;
    for (const [handle, reject] of this.scheduled) {
      clearImmediate(handle);
      reject(new PoolError(`Worker ${this.workerId} was closed before its task started`));
    }
    this.scheduled.clear();
  }
}

export interface ThreadSlotOptions<TResult> {
  /** Compiled worker entry point */
  script: URL | string;
  /** Passed to the worker once, at startup */
  workerData: unknown;
  /** Validates every result payload the worker sends back */
  resultSchema: z.ZodType<TResult>;
}

interface InFlight<TResult> {
  resolve: (result: TResult) => void;
  reject: (error: Error) => void;
}

export class ThreadSlot<TTask, TResult> implements WorkerSlot<TTask, TResult> {
  private readonly worker: Worker;
  private inFlight: InFlight<TResult> | null = null;
  private closed = false;

  constructor(
    readonly workerId: number,
    private readonly options: ThreadSlotOptions<TResult>,
  ) {
    this.worker = new Worker(options.script, { workerData: options.workerData });

    this.worker.on('message', (message: unknown) => this.handleMessage(message));
    this.worker.on('error', (err) => this.settle(new PoolError(`Worker ${workerId} crashed: ${err.message}`, err)));
    this.worker.on('exit', (code) => {
      if (!this.closed) {
        this.settle(new PoolError(`Worker ${workerId} exited unexpectedly with code ${code}`));
      }
    });
  }

  run(task: TTask): Promise<TResult> {
    if (this.closed) {
      return Promise.reject(new PoolError(`Worker ${this.workerId} is closed`));
    }
    if (this.inFlight) {
      return Promise.reject(new PoolError(`Worker ${this.workerId} is already running a task`));
    }

    return new Promise<TResult>((resolve, reject) => {
      this.inFlight = { resolve, reject };
      const request: SlotRequest<TTask> = { type: 'run', task };
      this.worker.postMessage(request);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.settle(new PoolError(`Worker ${this.workerId} was closed before its task finished`));
    await this.worker.terminate();
  }

  private handleMessage(message: unknown): void {
    const reply = SlotReplySchema.safeParse(message);
    if (!reply.success) {
      this.settle(new PoolError(`Worker ${this.workerId} sent a malformed reply`, reply.error));
      return;
    }

    if (reply.data.type === 'error') {
      this.settle(new Error(reply.data.message));
      return;
    }

    const payload = this.options.resultSchema.safeParse(reply.data.payload);
    if (!payload.success) {
      this.settle(new PoolError(`Worker ${this.workerId} sent an invalid result`, payload.error));
      return;
    }

    const pending = this.inFlight;
    this.inFlight = null;
    pending?.resolve(payload.data);
  }

  private settle(error: unknown): void {
    const pending = this.inFlight;
    this.inFlight = null;
    pending?.reject(toError(error));
  }
}
