import { ChoiceLengthError } from '../core/errors.js';
import type { Knapsack } from '../knapsack/knapsack.js';
import type { ChoiceVector } from '../knapsack/choices.js';
import { overloaded, valueScore, type CliffScore } from './cliff-score.js';
import type { Scorer } from './types.js';

/**
 * Hard-threshold scoring: a selection heavier than the capacity is
 * `overloaded` no matter how far over it is; otherwise it scores its value.
 */
export function cliffScore(knapsack: Knapsack, choices: ChoiceVector): CliffScore {
  if (knapsack.weight(choices) > knapsack.capacity) {
    return overloaded();
  }
  return valueScore(knapsack.value(choices));
}

export interface CliffScorerOptions {
  /**
   * Throw ChoiceLengthError when a choice vector's length differs from the
   * item count instead of pairing items and bits up to the shorter length.
   */
  strictLength?: boolean;
}

export class CliffScorer implements Scorer<ChoiceVector, CliffScore> {
  private readonly strictLength: boolean;

  constructor(readonly knapsack: Knapsack, options: CliffScorerOptions = {}) {
    this.strictLength = options.strictLength ?? false;
  }

  score(choices: ChoiceVector): CliffScore {
    if (this.strictLength && choices.length !== this.knapsack.numItems) {
      throw new ChoiceLengthError(this.knapsack.numItems, choices.length);
    }
    return cliffScore(this.knapsack, choices);
  }

  scoreAll(population: readonly ChoiceVector[]): CliffScore[] {
    return population.map(choices => this.score(choices));
  }
}
