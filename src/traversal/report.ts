/**
 * Run Reporter — summarizes fan-out results for display and export.
 */

import { formatDuration } from '../utils/timer.js';
import type { AllVerticesResult, RunSummary } from './types.js';

export function summarizeRun(run: AllVerticesResult): RunSummary {
  const tasksPerWorker: Record<number, number> = {};
  let totalTaskMs = 0;
  let maxTaskMs = 0;

  for (const result of run.results) {
    tasksPerWorker[result.workerId] = (tasksPerWorker[result.workerId] ?? 0) + 1;
    totalTaskMs += result.elapsedMs;
    maxTaskMs = Math.max(maxTaskMs, result.elapsedMs);
  }

  return {
    vertexCount: run.results.length,
    workerCount: run.workerCount,
    workersUsed: Object.keys(tasksPerWorker).length,
    totalElapsedMs: run.totalElapsedMs,
    meanTaskMs: run.results.length > 0 ? totalTaskMs / run.results.length : 0,
    maxTaskMs,
    tasksPerWorker,
  };
}

export class RunReporter {
  /** Format a run as an ASCII table for terminal display */
  formatTable(run: AllVerticesResult): string {
    const lines: string[] = [];
    const sep = '─'.repeat(72);

    lines.push(`  BFS fan-out ${run.runId}`);
    lines.push(`  ${sep}`);
    lines.push(`  ${'Start'.padEnd(8)} ${'Worker'.padEnd(8)} ${'Time'.padEnd(12)} Traversal`);
    lines.push(`  ${sep}`);

    for (const result of run.results) {
      lines.push(
        `  ${String(result.start).padEnd(8)} ${String(result.workerId).padEnd(8)} ${formatDuration(result.elapsedMs).padEnd(12)} ${result.traversal.join(' ')}`,
      );
    }

    lines.push(`  ${sep}`);
    lines.push(`  ${this.formatSummary(run)}`);
    return lines.join('\n');
  }

  formatJSON(run: AllVerticesResult): string {
    return JSON.stringify({ ...run, summary: summarizeRun(run) }, null, 2);
  }

  /** One-line summary */
  formatSummary(run: AllVerticesResult): string {
    const s = summarizeRun(run);
    return `${s.vertexCount} traversals | ${s.workersUsed}/${s.workerCount} workers used | total ${formatDuration(s.totalElapsedMs)} | mean ${formatDuration(s.meanTaskMs)} | max ${formatDuration(s.maxTaskMs)}`;
  }
}
