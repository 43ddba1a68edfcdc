import type { GenerationReport, GenerationReporter, Individual, RunSummary } from './types.js';

export interface TextReporterOptions<TCandidate, TScore> {
  formatScore: (score: TScore) => string;
  formatCandidate: (candidate: TCandidate) => string;
  /** Defaults to console.log */
  write?: (line: string) => void;
}

/**
 * Writes one human-readable line per generation (plus an entropy line when
 * measured) and a two-line run summary.
 */
export class TextReporter<TCandidate, TScore> implements GenerationReporter<TCandidate, TScore> {
  private readonly write: (line: string) => void;

  constructor(private readonly options: TextReporterOptions<TCandidate, TScore>) {
    this.write = options.write ?? (line => console.log(line));
  }

  generation(report: GenerationReport<TCandidate, TScore>): void {
    this.write(`Best score in generation ${report.generation} was ${this.options.formatScore(report.best.score)}`);
    if (report.entropy !== null) {
      this.write(`\tEntropy of the population was ${report.entropy.toFixed(4)}`);
    }
  }

  summary(summary: RunSummary<TCandidate, TScore>): void {
    this.write(`Best in final generation: ${this.describe(summary.bestInFinal)}`);
    this.write(`Best in overall run: ${summary.bestInRun ? this.describe(summary.bestInRun) : 'none'}`);
  }

  private describe(individual: Individual<TCandidate, TScore>): string {
    return `${this.options.formatCandidate(individual.candidate)} ${this.options.formatScore(individual.score)}`;
  }
}
