/**
 * Per-generation bookkeeping for an external generational optimizer:
 * best-of-generation reporting, population diversity, and the run's
 * best-ever record.
 */

export { BestEverRecord, type BestEverRecordOptions } from './best-ever.js';
export { GenerationTracker, type GenerationTrackerOptions } from './generation-tracker.js';
export { TextReporter, type TextReporterOptions } from './text-reporter.js';
export { selectBest } from './selectors.js';
export { genomeEntropy } from './entropy.js';
export {
  createCliffRecord,
  createCliffTracker,
  type CliffTrackerOptions,
  type KnapsackIndividualEvents,
} from './cliff-tracker.js';

export type {
  Individual,
  Population,
  Selector,
  DiversityMeasure,
  GenerationReport,
  RunSummary,
  GenerationReporter,
  BestImprovedEvent,
  TrackerEvents,
} from './types.js';
