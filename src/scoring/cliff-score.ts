/**
 * Score of a knapsack candidate under the cliff policy.
 *
 * `overloaded` ranks strictly below every `value` score, including a value
 * of 0; value scores rank by their total. There is no numeric sentinel for
 * the overloaded case.
 */
export type CliffScore =
  | { readonly kind: 'overloaded' }
  | { readonly kind: 'value'; readonly value: number };

export type Ordering = -1 | 0 | 1;

const OVERLOADED: CliffScore = Object.freeze({ kind: 'overloaded' });

export function overloaded(): CliffScore {
  return OVERLOADED;
}

export function valueScore(value: number): CliffScore {
  return { kind: 'value', value };
}

export function compareCliffScores(a: CliffScore, b: CliffScore): Ordering {
  if (a.kind === 'overloaded') {
    return b.kind === 'overloaded' ? 0 : -1;
  }
  if (b.kind === 'overloaded') {
    return 1;
  }
  if (a.value === b.value) return 0;
  return a.value < b.value ? -1 : 1;
}

export function cliffScoresEqual(a: CliffScore, b: CliffScore): boolean {
  return compareCliffScores(a, b) === 0;
}

/** True when `a` is strictly better than `b` */
export function isBetterCliffScore(a: CliffScore, b: CliffScore): boolean {
  return compareCliffScores(a, b) > 0;
}

export function maxCliffScore(a: CliffScore, b: CliffScore): CliffScore {
  return compareCliffScores(b, a) > 0 ? b : a;
}

export function formatCliffScore(score: CliffScore): string {
  return score.kind === 'overloaded' ? 'Overloaded' : `Score(${score.value})`;
}
