import type { Logger } from 'pino';
import type { EventBus } from '../core/events.js';
import { formatChoices, type ChoiceVector } from '../knapsack/choices.js';
import { compareCliffScores, formatCliffScore, type CliffScore } from '../scoring/cliff-score.js';
import { BestEverRecord } from './best-ever.js';
import { genomeEntropy } from './entropy.js';
import { GenerationTracker } from './generation-tracker.js';
import { TextReporter } from './text-reporter.js';
import type { Selector, TrackerEvents } from './types.js';

export type KnapsackIndividualEvents = TrackerEvents<ChoiceVector, CliffScore>;

export interface CliffTrackerOptions {
  /** Report population entropy (default true) */
  entropy?: boolean;
  select?: Selector<ChoiceVector, CliffScore>;
  write?: (line: string) => void;
  events?: EventBus<KnapsackIndividualEvents>;
  logger?: Logger;
}

export function createCliffRecord(): BestEverRecord<ChoiceVector, CliffScore> {
  return new BestEverRecord<ChoiceVector, CliffScore>(compareCliffScores, { copy: choices => [...choices] });
}

/**
 * Tracker for bit-string knapsack candidates scored with the cliff policy,
 * reporting as text.
 */
export function createCliffTracker(
  record: BestEverRecord<ChoiceVector, CliffScore>,
  options: CliffTrackerOptions = {},
): GenerationTracker<ChoiceVector, CliffScore> {
  return new GenerationTracker<ChoiceVector, CliffScore>({
    record,
    select: options.select,
    diversity: options.entropy === false ? undefined : population => genomeEntropy(population),
    reporter: new TextReporter<ChoiceVector, CliffScore>({
      formatScore: formatCliffScore,
      formatCandidate: formatChoices,
      write: options.write,
    }),
    events: options.events,
    logger: options.logger,
  });
}
