import { describe, it, expect } from 'vitest';
import { Item } from '../../../src/knapsack/item.js';
import { Knapsack } from '../../../src/knapsack/knapsack.js';
import { cliffScore, CliffScorer } from '../../../src/scoring/cliff-scorer.js';
import { overloaded, valueScore } from '../../../src/scoring/cliff-score.js';
import { ChoiceLengthError } from '../../../src/core/errors.js';

const knapsack = new Knapsack([new Item(1, 5, 8), new Item(2, 9, 6), new Item(3, 2, 7)], 13);

describe('cliffScore', () => {
  it('should score an over-capacity selection as overloaded', () => {
    expect(cliffScore(knapsack, [true, false, true])).toEqual(overloaded());
  });

  it('should score a feasible selection by its value', () => {
    expect(cliffScore(knapsack, [false, true, false])).toEqual(valueScore(9));
  });

  it('should score the empty selection as 0', () => {
    expect(cliffScore(knapsack, [false, false, false])).toEqual(valueScore(0));
  });

  it('should accept a selection whose weight equals the capacity', () => {
    const exact = new Knapsack([new Item(1, 4, 6), new Item(2, 3, 7)], 13);
    expect(cliffScore(exact, [true, true])).toEqual(valueScore(7));
  });

  it('should only score weightless selections when capacity is 0', () => {
    const empty = new Knapsack([new Item(1, 4, 0), new Item(2, 3, 1)], 0);
    expect(cliffScore(empty, [false, false])).toEqual(valueScore(0));
    expect(cliffScore(empty, [true, false])).toEqual(valueScore(4));
    expect(cliffScore(empty, [true, true])).toEqual(overloaded());
  });

  it('should give no partial credit for being slightly over', () => {
    const tight = new Knapsack([new Item(1, 100, 14)], 13);
    expect(cliffScore(tight, [true])).toEqual(overloaded());
  });
});

describe('CliffScorer', () => {
  it('should apply the cliff policy', () => {
    const scorer = new CliffScorer(knapsack);
    expect(scorer.score([true, false, true])).toEqual(overloaded());
    expect(scorer.score([true, true, false])).toEqual(overloaded());
    expect(scorer.score([false, true, true])).toEqual(valueScore(11));
  });

  it('should score a whole population in order', () => {
    const scorer = new CliffScorer(knapsack);
    expect(scorer.scoreAll([[false, false, false], [true, false, true], [false, true, false]])).toEqual([
      valueScore(0),
      overloaded(),
      valueScore(9),
    ]);
  });

  it('should pair items and bits up to the shorter length by default', () => {
    const scorer = new CliffScorer(knapsack);
    expect(scorer.score([false, true])).toEqual(valueScore(9));
  });

  it('should reject a mismatched length in strict mode', () => {
    const scorer = new CliffScorer(knapsack, { strictLength: true });
    expect(() => scorer.score([false, true])).toThrow(ChoiceLengthError);
    expect(() => scorer.score([false, true])).toThrow('Choice vector has 2 bits but the knapsack has 3 items');
    expect(scorer.score([false, true, false])).toEqual(valueScore(9));
  });
});
