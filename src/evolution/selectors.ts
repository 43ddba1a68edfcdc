import { SelectionError } from '../core/errors.js';
import type { ScoreOrder } from '../scoring/types.js';
import type { Individual, Population } from './types.js';

/**
 * Highest-scoring member; the earliest one wins a tie.
 */
export function selectBest<TCandidate, TScore>(
  population: Population<TCandidate, TScore>,
  compare: ScoreOrder<TScore>,
): Individual<TCandidate, TScore> {
  const [first, ...rest] = population;
  if (first === undefined) {
    throw new SelectionError('Cannot select the best individual from an empty population');
  }
  return rest.reduce((best, candidate) => (compare(candidate.score, best.score) > 0 ? candidate : best), first);
}
