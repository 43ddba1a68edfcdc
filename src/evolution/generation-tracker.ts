import type { Logger } from 'pino';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { BestEverRecord } from './best-ever.js';
import { selectBest } from './selectors.js';
import type {
  DiversityMeasure,
  GenerationReport,
  GenerationReporter,
  Population,
  RunSummary,
  Selector,
  TrackerEvents,
} from './types.js';

export interface GenerationTrackerOptions<TCandidate, TScore> {
  /** Best-ever record, owned by the caller */
  record: BestEverRecord<TCandidate, TScore>;
  select?: Selector<TCandidate, TScore>;
  /** Omit to skip the diversity report */
  diversity?: DiversityMeasure<TCandidate, TScore>;
  reporter?: GenerationReporter<TCandidate, TScore>;
  events?: EventBus<TrackerEvents<TCandidate, TScore>>;
  logger?: Logger;
}

/**
 * Called by the optimizer once per generation, after the whole population
 * has been scored. Reports the generation's best and its diversity, then
 * folds the best into the run's best-ever record.
 */
export class GenerationTracker<TCandidate, TScore> {
  private readonly record: BestEverRecord<TCandidate, TScore>;
  private readonly select: Selector<TCandidate, TScore>;
  private readonly diversity?: DiversityMeasure<TCandidate, TScore>;
  private readonly reporter?: GenerationReporter<TCandidate, TScore>;
  private readonly events?: EventBus<TrackerEvents<TCandidate, TScore>>;
  private readonly logger: Logger;
  private generationsSeen = 0;

  constructor(options: GenerationTrackerOptions<TCandidate, TScore>) {
    this.record = options.record;
    this.select = options.select ?? selectBest;
    this.diversity = options.diversity;
    this.reporter = options.reporter;
    this.events = options.events;
    this.logger = options.logger ?? getLogger();
  }

  reportOnGeneration(
    generation: number,
    population: Population<TCandidate, TScore>,
  ): GenerationReport<TCandidate, TScore> {
    const best = this.select(population, this.record.compare);
    const entropy = this.diversity ? this.diversity(population) : null;

    const previous = this.record.current;
    const improved = this.record.offer(best);
    const bestInRun = this.record.current ?? best;
    this.generationsSeen++;

    const report: GenerationReport<TCandidate, TScore> = { generation, best, entropy, improved, bestInRun };

    this.logger.debug(
      { generation, populationSize: population.length, entropy, improved },
      'Generation reported',
    );
    this.reporter?.generation(report);
    this.events?.emit('generation:reported', report);
    if (improved) {
      this.events?.emit('best:improved', { generation, previous, current: bestInRun });
    }

    return report;
  }

  /**
   * Report the best of the final population alongside the best of the run.
   */
  summarize(finalPopulation: Population<TCandidate, TScore>): RunSummary<TCandidate, TScore> {
    const summary: RunSummary<TCandidate, TScore> = {
      bestInFinal: this.select(finalPopulation, this.record.compare),
      bestInRun: this.record.current,
    };

    this.logger.debug({ generations: this.generationsSeen }, 'Run summarized');
    this.reporter?.summary(summary);
    this.events?.emit('run:summarized', summary);
    return summary;
  }

  get generationCount(): number {
    return this.generationsSeen;
  }
}
