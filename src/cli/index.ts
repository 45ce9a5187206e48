/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { FanoutError } from '../core/errors.js';
import { createTraverseCommand } from './commands/traverse.js';
import { createGenerateCommand } from './commands/generate.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Concurrent breadth-first traversal from every vertex of an adjacency-matrix graph');

  program.addCommand(createTraverseCommand());
  program.addCommand(createGenerateCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      const code = error instanceof FanoutError ? ` [${error.code}]` : '';
      console.error(`\n✖ ${error.message}${code}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  }
}
