/**
 * `cliff-knapsack replay <population-file>` — Feed generations recorded by an
 * external optimizer through the cliff scorer and the generation tracker.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { EventBus } from '../../core/events.js';
import { formatChoices } from '../../knapsack/choices.js';
import { loadKnapsack } from '../../knapsack/loader.js';
import { formatCliffScore } from '../../scoring/cliff-score.js';
import { CliffScorer } from '../../scoring/cliff-scorer.js';
import type { KnapsackIndividualEvents } from '../../evolution/cliff-tracker.js';
import { replayRun } from '../../evolution/replay.js';
import { readPopulationFile } from '../population-file.js';
import { prepareCommand, resolveInstancePath, type CommonOptions } from '../setup.js';

interface ReplayOptions extends CommonOptions {
  instance?: string;
  strict?: boolean;
  entropy?: boolean;
}

export function createReplayCommand(): Command {
  const cmd = new Command('replay');

  cmd
    .description('Score recorded generations and report the best per generation and overall')
    .argument('<population-file>', 'JSON Lines file, one array of bit strings per generation')
    .option('-i, --instance <path>', 'Instance file (defaults to instance.path from config)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--strict', 'Reject candidates whose length differs from the item count')
    .option('--no-entropy', 'Skip the population entropy report')
    .action((populationFile: string, options: ReplayOptions) => {
      const context = prepareCommand(options, {
        scoring: options.strict ? { strictLength: true } : undefined,
        report: options.entropy === false ? { entropy: false } : undefined,
      });
      const instancePath = resolveInstancePath(options.instance, context);
      const knapsack = loadKnapsack(instancePath);
      const generations = readPopulationFile(resolve(context.projectDir, populationFile));

      console.log(`Running on knapsack at: ${instancePath}`);

      const events = new EventBus<KnapsackIndividualEvents>();
      events.on('best:improved', ({ generation, current }) => {
        context.logger.debug(
          { generation, candidate: formatChoices(current.candidate), score: formatCliffScore(current.score) },
          'New best in run',
        );
      });

      replayRun(new CliffScorer(knapsack, { strictLength: context.config.scoring.strictLength }), generations, {
        entropy: context.config.report.entropy,
        events,
      });
    });

  return cmd;
}
