import { InstanceFormatError } from '../core/errors.js';
import { parseUnsigned } from './unsigned.js';

/**
 * One item of a knapsack instance. `id` is informational; only `value` and
 * `weight` take part in scoring.
 */
export class Item {
  constructor(
    readonly id: number,
    readonly value: number,
    readonly weight: number,
  ) {}

  /**
   * Parse an item line of exactly three whitespace separated unsigned
   * integers: `<id> <value> <weight>`.
   */
  static parse(line: string, lineNumber?: number): Item {
    const tokens = line.split(/\s+/).filter(token => token.length > 0);

    const fields: number[] = [];
    for (const token of tokens) {
      const parsed = parseUnsigned(token);
      if (parsed === null) {
        throw new InstanceFormatError(
          `The item specification line '${line}' has a field '${token}' that is not an unsigned integer`,
          lineNumber,
          line,
        );
      }
      fields.push(parsed);
    }

    const [id, value, weight] = fields;
    if (fields.length !== 3 || id === undefined || value === undefined || weight === undefined) {
      throw new InstanceFormatError(
        `The item specification line '${line}' should have had 3 whitespace separated fields, found ${fields.length}`,
        lineNumber,
        line,
      );
    }

    return new Item(id, value, weight);
  }

  equals(other: Item): boolean {
    return this.id === other.id && this.value === other.value && this.weight === other.weight;
  }

  toLine(): string {
    return `${this.id} ${this.value} ${this.weight}`;
  }
}
