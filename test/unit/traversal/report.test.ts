import { describe, it, expect } from 'vitest';
import { RunReporter, summarizeRun } from '../../../src/traversal/report.js';
import type { AllVerticesResult } from '../../../src/traversal/types.js';

const run: AllVerticesResult = {
  runId: 'run-abc123',
  workerCount: 4,
  totalElapsedMs: 12,
  results: [
    { start: 0, traversal: [0, 1, 2], elapsedMs: 2, workerId: 1 },
    { start: 1, traversal: [1, 0, 2], elapsedMs: 4, workerId: 2 },
    { start: 2, traversal: [2, 1, 0], elapsedMs: 6, workerId: 1 },
  ],
};

const empty: AllVerticesResult = { runId: 'run-empty0', workerCount: 2, totalElapsedMs: 0, results: [] };

describe('summarizeRun()', () => {
  it('should aggregate timing and worker usage', () => {
    expect(summarizeRun(run)).toEqual({
      vertexCount: 3,
      workerCount: 4,
      workersUsed: 2,
      totalElapsedMs: 12,
      meanTaskMs: 4,
      maxTaskMs: 6,
      tasksPerWorker: { 1: 2, 2: 1 },
    });
  });

  it('should report zeros for an empty run', () => {
    expect(summarizeRun(empty)).toEqual({
      vertexCount: 0,
      workerCount: 2,
      workersUsed: 0,
      totalElapsedMs: 0,
      meanTaskMs: 0,
      maxTaskMs: 0,
      tasksPerWorker: {},
    });
  });
});

describe('RunReporter', () => {
  const reporter = new RunReporter();

  it('should format a one-line summary', () => {
    expect(reporter.formatSummary(run)).toBe(
      '3 traversals | 2/4 workers used | total 12ms | mean 4ms | max 6ms',
    );
  });

  it('should format one table row per traversal', () => {
    const lines = reporter.formatTable(run).split('\n');

    expect(lines[0]).toBe('  BFS fan-out run-abc123');
    expect(lines[2]).toBe('  Start    Worker   Time         Traversal');
    expect(lines[4]).toBe('  0        1        2ms          0 1 2');
    expect(lines[6]).toBe('  2        1        6ms          2 1 0');
    expect(lines[lines.length - 1]).toBe(
      '  3 traversals | 2/4 workers used | total 12ms | mean 4ms | max 6ms',
    );
  });

  it('should export JSON with the summary attached', () => {
    const parsed: unknown = JSON.parse(reporter.formatJSON(run));
    expect(parsed).toMatchObject({
      runId: 'run-abc123',
      summary: { workersUsed: 2, meanTaskMs: 4 },
    });
  });
});
