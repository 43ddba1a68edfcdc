/**
 * Instance file format:
 *
 * ```text
 * 3          <- number of items N
 * 1 3 8      <- N lines of `<id> <value> <weight>`
 * 2 2 8
 * 3 9 1
 * 10         <- capacity
 * ```
 *
 * Lines are consumed strictly in order. Anything after the capacity line is
 * ignored. Instances whose total value or total weight passes
 * Number.MAX_SAFE_INTEGER are rejected, so every subset sum stays exact.
 */

import { readFileSync } from 'fs';
import { InstanceFormatError, InstanceIoError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { Item } from './item.js';
import { Knapsack } from './knapsack.js';
import { LineCursor } from './line-cursor.js';
import { parseUnsigned } from './unsigned.js';

export function parseKnapsack(text: string, source: string = '<input>'): Knapsack {
  const cursor = new LineCursor(text);

  const countLine = cursor.next();
  if (!countLine) {
    throw new InstanceFormatError(`The input ${source} was empty`);
  }
  const numItems = parseUnsigned(countLine.text);
  if (numItems === null) {
    throw new InstanceFormatError(
      `The item count '${countLine.text}' on line 1 of ${source} is not an unsigned integer`,
      countLine.number,
      countLine.text,
    );
  }

  const items: Item[] = [];
  for (let n = 0; n < numItems; n++) {
    const line = cursor.next();
    if (!line) {
      throw new InstanceFormatError(
        `Expected ${numItems} item lines in ${source} but only found ${items.length}; is the number of items on the first line correct?`,
      );
    }
    items.push(Item.parse(line.text, line.number));
  }

  const totalValue = items.reduce((sum, item) => sum + item.value, 0);
  const totalWeight = items.reduce((sum, item) => sum + item.weight, 0);
  if (!Number.isSafeInteger(totalValue) || !Number.isSafeInteger(totalWeight)) {
    throw new InstanceFormatError(
      `The item totals in ${source} exceed ${Number.MAX_SAFE_INTEGER} and cannot be summed exactly`,
    );
  }

  const capacityLine = cursor.next();
  if (!capacityLine) {
    throw new InstanceFormatError(
      `There was no capacity line in ${source}; this might be because the number of items was set incorrectly`,
    );
  }
  const capacity = parseUnsigned(capacityLine.text);
  if (capacity === null) {
    throw new InstanceFormatError(
      `The capacity '${capacityLine.text}' on line ${capacityLine.number} of ${source} is not an unsigned integer`,
      capacityLine.number,
      capacityLine.text,
    );
  }

  return new Knapsack(items, capacity);
}

/**
 * Read and parse an instance file. Nothing is returned unless the whole
 * file parses.
 */
export function loadKnapsack(filePath: string): Knapsack {
  const logger = getLogger();

  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const cause = err instanceof Error ? err : undefined;
    throw new InstanceIoError(
      `Failed to read knapsack instance ${filePath}: ${cause?.message ?? String(err)}`,
      filePath,
      cause,
    );
  }

  const knapsack = parseKnapsack(text, filePath);
  logger.debug(
    { path: filePath, numItems: knapsack.numItems, capacity: knapsack.capacity },
    'Loaded knapsack instance',
  );
  return knapsack;
}

export function serializeKnapsack(knapsack: Knapsack): string {
  const lines = [String(knapsack.numItems), ...knapsack.items.map(item => item.toLine()), String(knapsack.capacity)];
  return `${lines.join('\n')}\n`;
}
