/**
 * Fan-Out Orchestrator
 * Runs one BFS per vertex on a bounded pool and collects every result,
 * in vertex order, before returning.
 *
 * There is no cancellation or timeout: a task that never finishes keeps
 * traverseFromAllVertices() pending.
 */

import { nanoid } from 'nanoid';
import type pino from 'pino';
import { InvalidWorkerCountError, TaskFailureError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { TraversalMode } from '../core/types.js';
import type { Graph } from '../graph/graph.js';
import type { Vertex } from '../graph/types.js';
import { InProcessSlot, ThreadSlot } from '../pool/slots.js';
import type { SlotFactory } from '../pool/types.js';
import { withPool, type WorkerPool } from '../pool/worker-pool.js';
import { measure } from '../utils/timer.js';
import { runBfsTask } from './bfs-task.js';
import {
  TimedTraversalSchema,
  type AllVerticesResult,
  type SingleVertexResult,
  type TimedTraversal,
} from './types.js';

/** Compiled worker sits next to the compiled orchestrator */
export const DEFAULT_WORKER_SCRIPT = new URL('./bfs-worker.js', import.meta.url);

export interface OrchestratorOptions {
  mode?: TraversalMode;
  /** Entry point for 'thread' mode; must be runnable JavaScript */
  workerScript?: URL | string;
  logger?: pino.Logger;
}

type BfsPool = WorkerPool<Vertex, TimedTraversal>;

export class FanOutOrchestrator {
  private readonly mode: TraversalMode;
  private readonly workerScript: URL | string;
  private readonly logger: pino.Logger;

  constructor(options: OrchestratorOptions = {}) {
    this.mode = options.mode ?? 'in-process';
    this.workerScript = options.workerScript ?? DEFAULT_WORKER_SCRIPT;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * BFS from every vertex of `graph` with at most `workerCount` traversals in flight.
   *
   * Rejects with InvalidWorkerCountError when `workerCount` is not an integer >= 1,
   * whatever the size of the graph, and with TaskFailureError if any traversal fails.
   */
  async traverseFromAllVertices(graph: Graph, workerCount: number): Promise<AllVerticesResult> {
    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new InvalidWorkerCountError(workerCount);
    }

    const runId = nanoid(10);
    const log = this.logger.child({ runId });
    const vertices = [...graph.getVertices()].sort((a, b) => a - b);

    log.debug(
      { vertexCount: vertices.length, workerCount, mode: this.mode },
      'Starting BFS traversal from all vertices',
    );

    if (vertices.length === 0) {
      return { runId, results: [], totalElapsedMs: 0, workerCount };
    }

    const { result: results, elapsedMs } = await measure(() =>
      withPool({ maxWorkers: workerCount, name: `bfs-${runId}` }, this.createSlotFactory(graph), (pool) =>
        Promise.all(vertices.map((vertex) => this.runTask(pool, vertex, log))),
      ),
    );

    log.info(
      {
        vertexCount: vertices.length,
        workerCount,
        workersUsed: new Set(results.map((r) => r.workerId)).size,
        totalElapsedMs: elapsedMs,
      },
      'Finished BFS traversal from all vertices',
    );

    return { runId, results, totalElapsedMs: elapsedMs, workerCount };
  }

  private async runTask(pool: BfsPool, vertex: Vertex, log: pino.Logger): Promise<SingleVertexResult> {
    try {
      const { workerId, result } = await pool.submit(vertex);
      log.debug({ vertex, workerId, elapsedMs: result.elapsedMs }, 'Finished BFS from vertex');
      return { start: vertex, traversal: result.traversal, elapsedMs: result.elapsedMs, workerId };
    } catch (error) {
      const failure = new TaskFailureError(vertex, toError(error));
      // Once the pool is shutting down, the fan-out has already failed
      if (pool.shutDown) {
        log.debug({ vertex, reason: failure.message }, 'BFS task cancelled');
      } else {
        log.error({ vertex, err: failure }, 'BFS task failed');
      }
      throw failure;
    }
  }

  private createSlotFactory(graph: Graph): SlotFactory<Vertex, TimedTraversal> {
    if (this.mode === 'thread') {
      const workerData = { matrix: graph.toMatrix() };
      return (workerId) =>
        new ThreadSlot<Vertex, TimedTraversal>(workerId, {
          script: this.workerScript,
          workerData,
          resultSchema: TimedTraversalSchema,
        });
    }

    return (workerId) => new InProcessSlot<Vertex, TimedTraversal>(workerId, (vertex) => runBfsTask(graph, vertex));
  }
}
