/**
 * `fanout-bfs traverse` — BFS from every vertex of a graph file.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { InvalidWorkerCountError } from '../../core/errors.js';
import { createLogger, setLogger } from '../../core/logger.js';
import type { FanoutConfigInput } from '../../core/types.js';
import { loadGraphFile } from '../../graph/persistence.js';
import { FanOutOrchestrator } from '../../traversal/orchestrator.js';
import { RunReporter } from '../../traversal/report.js';
import type { AllVerticesResult } from '../../traversal/types.js';
import { NAME } from '../../version.js';

export interface TraverseOptions {
  workers?: number;
  threads?: boolean;
  json?: boolean;
  config: string;
}

export function createTraverseCommand(): Command {
  const cmd = new Command('traverse');

  cmd
    .description('Run a breadth-first traversal from every vertex of a graph file')
    .argument('<file>', 'Graph file (vertex count, then one row of 0/1 per line)')
    .option('-w, --workers <count>', 'Number of concurrent workers', Number)
    .option('--threads', 'Run traversals on worker threads')
    .option('--json', 'Output results as JSON')
    .option('-c, --config <directory>', 'Directory containing fanout.config.yaml', '.')
    .action(async (file: string, options: TraverseOptions) => {
      await executeTraverse(file, options);
    });

  return cmd;
}

export async function executeTraverse(
  file: string,
  options: TraverseOptions,
  print: (line: string) => void = console.log,
): Promise<AllVerticesResult> {
  if (options.workers !== undefined && (!Number.isInteger(options.workers) || options.workers < 1)) {
    throw new InvalidWorkerCountError(options.workers);
  }

  const overrides: FanoutConfigInput = {
    traversal: {
      workers: options.workers,
      mode: options.threads ? 'thread' : undefined,
    },
  };
  const config = new ConfigManager(resolve(options.config)).load(overrides);
  const logger = createLogger(NAME, config.logging);
  setLogger(logger);

  const graph = loadGraphFile(resolve(file));
  const orchestrator = new FanOutOrchestrator({ mode: config.traversal.mode, logger });
  const run = await orchestrator.traverseFromAllVertices(graph, config.traversal.workers);

  const reporter = new RunReporter();
  print(options.json ? reporter.formatJSON(run) : reporter.formatTable(run));
  return run;
}
