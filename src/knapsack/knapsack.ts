import type { Item } from './item.js';
import type { ChoiceVector } from './choices.js';

/**
 * A 0/1 knapsack instance: an ordered list of items and the maximum total
 * weight it can hold. Item `i` is governed by choice bit `i`.
 *
 * Instances are read-only after construction, so a single instance can be
 * shared by every evaluation of a run.
 */
export class Knapsack implements Iterable<Item> {
  private readonly _items: readonly Item[];

  constructor(items: readonly Item[], readonly capacity: number) {
    this._items = Object.freeze([...items]);
  }

  get items(): readonly Item[] {
    return this._items;
  }

  get numItems(): number {
    return this._items.length;
  }

  /**
   * The item at `index`, or undefined when the index is not a legal one.
   */
  getItem(index: number): Item | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this._items.length) {
      return undefined;
    }
    return this._items[index];
  }

  [Symbol.iterator](): Iterator<Item> {
    return this._items[Symbol.iterator]();
  }

  /**
   * Total value of the chosen items. Items and choices are paired up to the
   * shorter of the two; anything past that is left out.
   * Exact only while the total stays within Number.MAX_SAFE_INTEGER, which
   * the loader guarantees for instances it parses.
   */
  value(choices: ChoiceVector): number {
    return this.sumChosen(choices, item => item.value);
  }

  /**
   * Total weight of the chosen items, paired the same way as `value`.
   */
  weight(choices: ChoiceVector): number {
    return this.sumChosen(choices, item => item.weight);
  }

  private sumChosen(choices: ChoiceVector, field: (item: Item) => number): number {
    const length = Math.min(this._items.length, choices.length);
    let total = 0;
    for (let i = 0; i < length; i++) {
      const item = this._items[i];
      if (item && choices[i]) {
        total += field(item);
      }
    }
    return total;
  }
}
