/**
 * `fanout-bfs generate` — write a random undirected graph.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import type { Graph } from '../../graph/graph.js';
import { saveGraphFile, serializeGraph } from '../../graph/persistence.js';
import { randomGraph, seededRandom } from '../../graph/random.js';

export interface GenerateOptions {
  output?: string;
  seed?: number;
}

export function createGenerateCommand(): Command {
  const cmd = new Command('generate');

  cmd
    .description('Generate a random undirected graph')
    .argument('<vertices>', 'Number of vertices', Number)
    .option('-o, --output <file>', 'Write the graph to a file instead of stdout')
    .option('--seed <seed>', 'Seed for a reproducible graph', Number)
    .action((vertices: number, options: GenerateOptions) => {
      executeGenerate(vertices, options);
    });

  return cmd;
}

export function executeGenerate(
  vertices: number,
  options: GenerateOptions,
  print: (line: string) => void = console.log,
): Graph {
  const random = options.seed !== undefined ? seededRandom(options.seed) : Math.random;
  const graph = randomGraph(vertices, random);

  if (options.output) {
    const target = resolve(options.output);
    saveGraphFile(target, graph);
    print(`Wrote ${graph.vertexCount()}-vertex graph to ${target}`);
  } else {
    print(serializeGraph(graph));
  }

  return graph;
}
