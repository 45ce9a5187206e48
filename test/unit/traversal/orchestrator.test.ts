import { describe, it, expect, vi, afterEach } from 'vitest';
import pino from 'pino';
import { Graph } from '../../../src/graph/graph.js';
import { randomGraph, seededRandom } from '../../../src/graph/random.js';
import { bfsFrom } from '../../../src/traversal/bfs.js';
import { FanOutOrchestrator } from '../../../src/traversal/orchestrator.js';
import { WorkerPool } from '../../../src/pool/worker-pool.js';
import { InvalidWorkerCountError } from '../../../src/core/errors.js';

const triangle = Graph.fromMatrix([
  [0, 1, 0],
  [1, 0, 1],
  [0, 1, 1],
]);

/** Logger that keeps every JSON line it writes */
function capturingLogger(): { logger: pino.Logger; records: () => Array<Record<string, unknown>> } {
  const lines: string[] = [];
  const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
  return {
    logger,
    records: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe('FanOutOrchestrator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should traverse from every vertex in vertex order', async () => {
    const run = await new FanOutOrchestrator().traverseFromAllVertices(triangle, 2);

    expect(run.workerCount).toBe(2);
    expect(run.results.map((r) => r.start)).toEqual([0, 1, 2]);
    expect(run.results.map((r) => r.traversal)).toEqual([
      [0, 1, 2],
      [1, 0, 2],
      [2, 1, 0],
    ]);
    for (const result of run.results) {
      expect([1, 2]).toContain(result.workerId);
      expect(result.elapsedMs).toBeGreaterThanOrEqual(0);
    }
    expect(run.totalElapsedMs).toBeGreaterThanOrEqual(0);
    expect(run.runId).toMatch(/^[A-Za-z0-9_-]{10}$/);
  });

  it('should return no results for the empty graph without starting a pool', async () => {
    const submit = vi.spyOn(WorkerPool.prototype, 'submit');
    const shutdown = vi.spyOn(WorkerPool.prototype, 'shutdown');

    const run = await new FanOutOrchestrator().traverseFromAllVertices(Graph.empty(), 4);

    expect(run.results).toEqual([]);
    expect(run.totalElapsedMs).toBe(0);
    expect(run.workerCount).toBe(4);
    expect(submit).not.toHaveBeenCalled();
    expect(shutdown).not.toHaveBeenCalled();
  });

  it('should reject worker counts below 1 regardless of graph size', async () => {
    const orchestrator = new FanOutOrchestrator();

    await expect(orchestrator.traverseFromAllVertices(triangle, 0)).rejects.toThrow(InvalidWorkerCountError);
    await expect(orchestrator.traverseFromAllVertices(triangle, -3)).rejects.toThrow(
      'Worker count must be an integer of at least 1, got -3',
    );
    await expect(orchestrator.traverseFromAllVertices(triangle, 1.5)).rejects.toThrow(InvalidWorkerCountError);
    await expect(orchestrator.traverseFromAllVertices(Graph.empty(), 0)).rejects.toThrow(InvalidWorkerCountError);
  });

  it('should accept more workers than vertices', async () => {
    const run = await new FanOutOrchestrator().traverseFromAllVertices(triangle, 16);

    expect(run.workerCount).toBe(16);
    expect(run.results).toHaveLength(3);
  });

  it('should run everything on worker 1 with a single worker', async () => {
    const run = await new FanOutOrchestrator().traverseFromAllVertices(triangle, 1);
    expect(run.results.map((r) => r.workerId)).toEqual([1, 1, 1]);
  });

  it('should match single-source BFS for every vertex of a random graph', async () => {
    const graph = randomGraph(40, seededRandom(99));
    const run = await new FanOutOrchestrator().traverseFromAllVertices(graph, 4);

    expect(run.results).toHaveLength(40);
    run.results.forEach((result, vertex) => {
      expect(result.start).toBe(vertex);
      expect(result.traversal).toEqual(bfsFrom(graph, vertex));
    });
  });

  it('should produce identical traversals on repeated runs', async () => {
    const graph = randomGraph(25, seededRandom(5));
    const orchestrator = new FanOutOrchestrator();

    const first = await orchestrator.traverseFromAllVertices(graph, 3);
    const second = await orchestrator.traverseFromAllVertices(graph, 3);

    expect(second.results.map((r) => r.traversal)).toEqual(first.results.map((r) => r.traversal));
    expect(second.runId).not.toBe(first.runId);
  });

  it('should shut its pool down after a run', async () => {
    const shutdown = vi.spyOn(WorkerPool.prototype, 'shutdown');
    await new FanOutOrchestrator().traverseFromAllVertices(triangle, 2);
    expect(shutdown).toHaveBeenCalledTimes(1);
  });

  it('should log a summary tagged with the run id', async () => {
    const { logger, records } = capturingLogger();
    const run = await new FanOutOrchestrator({ logger }).traverseFromAllVertices(triangle, 2);

    const summary = records().find((r) => r.msg === 'Finished BFS traversal from all vertices');
    expect(summary).toMatchObject({
      runId: run.runId,
      vertexCount: 3,
      workerCount: 2,
      totalElapsedMs: run.totalElapsedMs,
    });

    const perVertex = records().filter((r) => r.msg === 'Finished BFS from vertex');
    expect(perVertex.map((r) => r.vertex)).toEqual([0, 1, 2]);
  });

  it('should run traversals on worker threads in thread mode', async () => {
    const graph = randomGraph(12, seededRandom(3));
    const orchestrator = new FanOutOrchestrator({
      mode: 'thread',
      workerScript: new URL('../../fixtures/bfs-worker.mjs', import.meta.url),
    });

    const run = await orchestrator.traverseFromAllVertices(graph, 3);

    expect(run.results).toHaveLength(12);
    run.results.forEach((result, vertex) => {
      expect(result.traversal).toEqual(bfsFrom(graph, vertex));
      expect([1, 2, 3]).toContain(result.workerId);
    });
  });
});
