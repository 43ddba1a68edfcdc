import { formatChoices } from '../knapsack/choices.js';
import type { Population } from './types.js';

/**
 * Shannon entropy, in bits, of the distribution of distinct candidates in a
 * population. 0 when every member is identical (or there are none); log2(n)
 * when all n members differ.
 */
export function genomeEntropy<TCandidate, TScore>(
  population: Population<TCandidate, TScore>,
  keyOf: (candidate: TCandidate) => string = candidateKey,
): number {
  if (population.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const { candidate } of population) {
    const key = keyOf(candidate);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / population.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

function candidateKey(candidate: unknown): string {
  if (Array.isArray(candidate) && candidate.every((bit): bit is boolean => typeof bit === 'boolean')) {
    return formatChoices(candidate);
  }
  return JSON.stringify(candidate) ?? String(candidate);
}
