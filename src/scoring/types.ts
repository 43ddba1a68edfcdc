import type { Ordering } from './cliff-score.js';

/**
 * Maps one candidate to its score. Implementations are pure so a population
 * can be evaluated in any order, or in parallel, against shared inputs.
 */
export interface Scorer<TCandidate, TScore> {
  score(candidate: TCandidate): TScore;
}

/** Total order over scores; a positive result means `a` is better */
export type ScoreOrder<TScore> = (a: TScore, b: TScore) => Ordering;
