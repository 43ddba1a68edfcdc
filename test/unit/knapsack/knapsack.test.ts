import { describe, it, expect } from 'vitest';
import { Item } from '../../../src/knapsack/item.js';
import { Knapsack } from '../../../src/knapsack/knapsack.js';
import { formatChoices, parseChoices } from '../../../src/knapsack/choices.js';

function sampleKnapsack(capacity = 100): Knapsack {
  return new Knapsack([new Item(1, 5, 8), new Item(2, 9, 6), new Item(3, 2, 7)], capacity);
}

describe('Knapsack', () => {
  describe('construction and access', () => {
    it('should expose items, count and capacity', () => {
      const knapsack = sampleKnapsack(13);
      expect(knapsack.numItems).toBe(3);
      expect(knapsack.capacity).toBe(13);
      expect(knapsack.items).toEqual([new Item(1, 5, 8), new Item(2, 9, 6), new Item(3, 2, 7)]);
    });

    it('should allow an empty instance with zero capacity', () => {
      const knapsack = new Knapsack([], 0);
      expect(knapsack.numItems).toBe(0);
      expect(knapsack.capacity).toBe(0);
      expect(knapsack.value([])).toBe(0);
    });

    it('should return the item at a legal index', () => {
      expect(sampleKnapsack().getItem(1)).toEqual(new Item(2, 9, 6));
    });

    it('should return undefined for an index out of range', () => {
      const knapsack = sampleKnapsack();
      expect(knapsack.getItem(3)).toBeUndefined();
      expect(knapsack.getItem(-1)).toBeUndefined();
      expect(knapsack.getItem(0.5)).toBeUndefined();
    });

    it('should not be affected by later changes to the source array', () => {
      const items = [new Item(1, 5, 8)];
      const knapsack = new Knapsack(items, 10);
      items.push(new Item(2, 1, 1));
      expect(knapsack.numItems).toBe(1);
    });

    it('should iterate items in order', () => {
      expect([...sampleKnapsack()].map(item => item.id)).toEqual([1, 2, 3]);
    });
  });

  describe('value', () => {
    it.each([
      [[false, false, false], 0],
      [[false, true, false], 9],
      [[true, false, true], 7],
      [[true, true, true], 16],
    ])('should sum the values of chosen items for %j', (choices, expected) => {
      expect(sampleKnapsack().value(choices)).toBe(expected);
    });

    it('should be 0 for the empty choice vector', () => {
      expect(sampleKnapsack().value([])).toBe(0);
    });
  });

  describe('weight', () => {
    it.each([
      [[false, false, false], 0],
      [[false, true, false], 6],
      [[true, false, true], 15],
      [[true, true, true], 21],
    ])('should sum the weights of chosen items for %j', (choices, expected) => {
      expect(sampleKnapsack().weight(choices)).toBe(expected);
    });
  });

  describe('mismatched choice lengths', () => {
    it('should leave out items past the end of a short choice vector', () => {
      const knapsack = sampleKnapsack();
      expect(knapsack.value([true, true])).toBe(14);
      expect(knapsack.weight([true, true])).toBe(14);
    });

    it('should ignore bits past the last item', () => {
      const knapsack = sampleKnapsack();
      expect(knapsack.value([false, false, true, true, true])).toBe(2);
      expect(knapsack.weight([false, false, true, true, true])).toBe(7);
    });
  });

  it('should give identical results on repeated calls', () => {
    const knapsack = sampleKnapsack();
    const choices = [true, false, true];
    expect(knapsack.value(choices)).toBe(knapsack.value(choices));
    expect(knapsack.weight(choices)).toBe(knapsack.weight(choices));
    expect(choices).toEqual([true, false, true]);
  });
});

describe('choice strings', () => {
  it('should parse 0/1 strings', () => {
    expect(parseChoices('0110')).toEqual([false, true, true, false]);
    expect(parseChoices('')).toEqual([]);
  });

  it('should reject other characters', () => {
    expect(parseChoices('01x')).toBeNull();
    expect(parseChoices('0 1')).toBeNull();
  });

  it('should format choices as a bit string', () => {
    expect(formatChoices([true, false, false, true])).toBe('1001');
  });
});
