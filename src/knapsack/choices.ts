/**
 * One inclusion bit per item, index-aligned with `Knapsack.items`.
 * Owned by the optimizer; the core only reads it.
 */
export type ChoiceVector = readonly boolean[];

/**
 * Parse a bit string such as `"0110"` into a choice vector.
 * Returns null when it contains anything other than `0` and `1`.
 */
export function parseChoices(bits: string): boolean[] | null {
  if (!/^[01]*$/.test(bits)) return null;
  return Array.from(bits, bit => bit === '1');
}

export function formatChoices(choices: ChoiceVector): string {
  return choices.map(included => (included ? '1' : '0')).join('');
}
