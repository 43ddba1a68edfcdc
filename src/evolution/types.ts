/**
 * Types shared by the per-generation bookkeeping. The optimizer that breeds
 * and selects candidates lives outside this package; these are the seams it
 * plugs into.
 */

import type { ScoreOrder } from '../scoring/types.js';

// ─── Population ─────────────────────────────────────────────────────────────

/** A scored candidate */
export interface Individual<TCandidate, TScore> {
  readonly candidate: TCandidate;
  readonly score: TScore;
}

export type Population<TCandidate, TScore> = readonly Individual<TCandidate, TScore>[];

// ─── Collaborators ──────────────────────────────────────────────────────────

/**
 * Picks the best member of a population under `compare`. Tie-breaking is up
 * to the implementation.
 */
export type Selector<TCandidate, TScore> = (
  population: Population<TCandidate, TScore>,
  compare: ScoreOrder<TScore>,
) => Individual<TCandidate, TScore>;

/** Scalar diversity measure over a population */
export type DiversityMeasure<TCandidate, TScore> = (population: Population<TCandidate, TScore>) => number;

// ─── Reporting ──────────────────────────────────────────────────────────────

export interface GenerationReport<TCandidate, TScore> {
  generation: number;
  best: Individual<TCandidate, TScore>;
  /** null when no diversity measure is configured */
  entropy: number | null;
  /** The generation's best replaced the best-ever record */
  improved: boolean;
  bestInRun: Individual<TCandidate, TScore>;
}

export interface RunSummary<TCandidate, TScore> {
  bestInFinal: Individual<TCandidate, TScore>;
  bestInRun: Individual<TCandidate, TScore> | null;
}

export interface GenerationReporter<TCandidate, TScore> {
  generation(report: GenerationReport<TCandidate, TScore>): void;
  summary(summary: RunSummary<TCandidate, TScore>): void;
}

export interface BestImprovedEvent<TCandidate, TScore> {
  generation: number;
  previous: Individual<TCandidate, TScore> | null;
  current: Individual<TCandidate, TScore>;
}

export interface TrackerEvents<TCandidate, TScore> {
  'generation:reported': GenerationReport<TCandidate, TScore>;
  'best:improved': BestImprovedEvent<TCandidate, TScore>;
  'run:summarized': RunSummary<TCandidate, TScore>;
}
