/**
 * `cliff-knapsack score [instance] --choices <bits>` — Score one candidate.
 */

import { Command, InvalidArgumentError } from 'commander';
import { parseChoices, formatChoices, type ChoiceVector } from '../../knapsack/choices.js';
import { loadKnapsack } from '../../knapsack/loader.js';
import { formatCliffScore } from '../../scoring/cliff-score.js';
import { CliffScorer } from '../../scoring/cliff-scorer.js';
import { prepareCommand, resolveInstancePath, type CommonOptions } from '../setup.js';

interface ScoreOptions extends CommonOptions {
  choices: boolean[];
  strict?: boolean;
  json?: boolean;
}

export interface CandidateEvaluation {
  choices: string;
  value: number;
  weight: number;
  capacity: number;
  score: string;
}

export function createScoreCommand(): Command {
  const cmd = new Command('score');

  cmd
    .description('Score one candidate selection with the cliff policy')
    .argument('[instance]', 'Instance file (defaults to instance.path from config)')
    .requiredOption('-c, --choices <bits>', 'Selected items as a string of 0 and 1, one per item', parseBitsOption)
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--strict', 'Reject a choice string whose length differs from the item count')
    .option('--json', 'Output as JSON')
    .action((instance: string | undefined, options: ScoreOptions) => {
      const context = prepareCommand(options, options.strict ? { scoring: { strictLength: true } } : undefined);
      const path = resolveInstancePath(instance, context);
      const scorer = new CliffScorer(loadKnapsack(path), { strictLength: context.config.scoring.strictLength });
      const evaluation = evaluateCandidate(scorer, options.choices);

      context.logger.debug({ path, ...evaluation }, 'Scored candidate');
      if (options.json) {
        console.log(JSON.stringify(evaluation, null, 2));
        return;
      }
      for (const line of formatEvaluation(evaluation)) {
        console.log(line);
      }
    });

  return cmd;
}

export function parseBitsOption(value: string): boolean[] {
  const choices = parseChoices(value);
  if (choices === null) {
    throw new InvalidArgumentError('Choices must be a string of 0 and 1.');
  }
  return choices;
}

export function evaluateCandidate(scorer: CliffScorer, choices: ChoiceVector): CandidateEvaluation {
  const score = scorer.score(choices);
  return {
    choices: formatChoices(choices),
    value: scorer.knapsack.value(choices),
    weight: scorer.knapsack.weight(choices),
    capacity: scorer.knapsack.capacity,
    score: formatCliffScore(score),
  };
}

export function formatEvaluation(evaluation: CandidateEvaluation): string[] {
  return [
    `Choices: ${evaluation.choices}`,
    `Value: ${evaluation.value}`,
    `Weight: ${evaluation.weight} / ${evaluation.capacity}`,
    `Score: ${evaluation.score}`,
  ];
}
