import type { ScoreOrder } from '../scoring/types.js';
import type { Individual } from './types.js';

export interface BestEverRecordOptions<TCandidate> {
  /**
   * Snapshot of a candidate taken when it is recorded. Candidates belong to
   * the optimizer, which may reuse or mutate them after a generation.
   * Defaults to keeping the candidate as given.
   */
  copy?: (candidate: TCandidate) => TCandidate;
}

/**
 * Best individual seen over a run. Owned by the run driver and handed to the
 * tracker explicitly; it only ever moves to a strictly better score.
 */
export class BestEverRecord<TCandidate, TScore> {
  private best: Individual<TCandidate, TScore> | null = null;
  private readonly copy: (candidate: TCandidate) => TCandidate;

  constructor(
    readonly compare: ScoreOrder<TScore>,
    options: BestEverRecordOptions<TCandidate> = {},
  ) {
    this.copy = options.copy ?? (candidate => candidate);
  }

  get current(): Individual<TCandidate, TScore> | null {
    return this.best;
  }

  /**
   * Keep a snapshot of `individual` if the record is empty or it scores
   * strictly better than the stored one. Returns whether the record changed.
   */
  offer(individual: Individual<TCandidate, TScore>): boolean {
    if (this.best !== null && this.compare(individual.score, this.best.score) <= 0) {
      return false;
    }
    this.best = { candidate: this.copy(individual.candidate), score: individual.score };
    return true;
  }
}
