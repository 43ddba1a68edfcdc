/**
 * cliff-knapsack — 0/1 knapsack fitness evaluation for generational search
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { loadKnapsack, CliffScorer, createCliffRecord, createCliffTracker } from 'cliff-knapsack';
 *
 * const scorer = new CliffScorer(loadKnapsack('instances/tiny.txt'));
 * const record = createCliffRecord();
 * const tracker = createCliffTracker(record);
 *
 * // inside the optimizer's generation loop
 * const scored = population.map(candidate => ({ candidate, score: scorer.score(candidate) }));
 * tracker.reportOnGeneration(generation, scored);
 * ```
 */

// Core
export { ConfigManager, type ConfigManagerOptions } from './core/config.js';
export { createLogger, getLogger, setLogger, type LoggerOptions } from './core/logger.js';
export { EventBus } from './core/events.js';
export {
  KnapsackError,
  ConfigError,
  InstanceIoError,
  InstanceFormatError,
  ChoiceLengthError,
  SelectionError,
  PopulationFileError,
} from './core/errors.js';
export {
  CliffKnapsackConfigSchema,
  LOG_LEVELS,
  type CliffKnapsackConfig,
  type CliffKnapsackConfigInput,
  type LogLevel,
} from './core/types.js';

// Instance model
export { Item } from './knapsack/item.js';
export { Knapsack } from './knapsack/knapsack.js';
export { parseKnapsack, loadKnapsack, serializeKnapsack } from './knapsack/loader.js';
export { LineCursor, type Line } from './knapsack/line-cursor.js';
export { parseChoices, formatChoices, type ChoiceVector } from './knapsack/choices.js';

// Scoring
export {
  overloaded,
  valueScore,
  compareCliffScores,
  cliffScoresEqual,
  isBetterCliffScore,
  maxCliffScore,
  formatCliffScore,
  type CliffScore,
  type Ordering,
} from './scoring/cliff-score.js';
export { cliffScore, CliffScorer, type CliffScorerOptions } from './scoring/cliff-scorer.js';
export type { Scorer, ScoreOrder } from './scoring/types.js';

// Generation tracking
export * from './evolution/index.js';
export { replayRun, type ReplayResult } from './evolution/replay.js';

// CLI
export { createCLI, main } from './cli/index.js';
export { readPopulationFile, parsePopulationLines } from './cli/population-file.js';

export { VERSION, NAME } from './version.js';
