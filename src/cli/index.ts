/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { KnapsackError } from '../core/errors.js';
import { createInspectCommand } from './commands/inspect.js';
import { createScoreCommand } from './commands/score.js';
import { createReplayCommand } from './commands/replay.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Cliff-scored 0/1 knapsack evaluation for generational search');

  program.addCommand(createInspectCommand());
  program.addCommand(createScoreCommand());
  program.addCommand(createReplayCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof KnapsackError) {
      console.error(`\n${error.name} [${error.code}]: ${error.message}\n`);
    } else if (error instanceof Error) {
      console.error(`\n${error.message}\n`);
    } else {
      console.error(`\n${String(error)}\n`);
    }
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}
