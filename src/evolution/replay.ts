import { SelectionError } from '../core/errors.js';
import type { ChoiceVector } from '../knapsack/choices.js';
import type { CliffScore } from '../scoring/cliff-score.js';
import type { CliffScorer } from '../scoring/cliff-scorer.js';
import { createCliffRecord, createCliffTracker, type CliffTrackerOptions } from './cliff-tracker.js';
import type { GenerationReport, Individual, RunSummary } from './types.js';

export interface ReplayResult {
  reports: GenerationReport<ChoiceVector, CliffScore>[];
  summary: RunSummary<ChoiceVector, CliffScore>;
}

/**
 * Drive the tracker over generations an optimizer already produced.
 * Each generation is scored in full before it is reported, so the best-ever
 * record only changes between generations. At least one generation is
 * required.
 */
export function replayRun(
  scorer: CliffScorer,
  generations: readonly (readonly ChoiceVector[])[],
  options: CliffTrackerOptions = {},
): ReplayResult {
  if (generations.length === 0) {
    throw new SelectionError('Cannot replay a run without any generations');
  }

  const record = createCliffRecord();
  const tracker = createCliffTracker(record, options);

  const reports: GenerationReport<ChoiceVector, CliffScore>[] = [];
  let population: Individual<ChoiceVector, CliffScore>[] = [];

  generations.forEach((candidates, generation) => {
    population = candidates.map(candidate => ({ candidate, score: scorer.score(candidate) }));
    reports.push(tracker.reportOnGeneration(generation, population));
  });

  return { reports, summary: tracker.summarize(population) };
}
