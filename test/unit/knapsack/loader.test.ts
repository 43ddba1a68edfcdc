import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import { loadKnapsack, parseKnapsack, serializeKnapsack } from '../../../src/knapsack/loader.js';
import { Item } from '../../../src/knapsack/item.js';
import { Knapsack } from '../../../src/knapsack/knapsack.js';
import { InstanceFormatError, InstanceIoError } from '../../../src/core/errors.js';

const FIXTURES = fileURLToPath(new URL('../../fixtures/', import.meta.url));

describe('parseKnapsack', () => {
  it('should parse the item count, items and capacity', () => {
    const knapsack = parseKnapsack('3\n1 3 8\n2 2 8\n3 9 1\n10\n');
    expect(knapsack.numItems).toBe(3);
    expect(knapsack.getItem(0)).toEqual(new Item(1, 3, 8));
    expect(knapsack.getItem(1)).toEqual(new Item(2, 2, 8));
    expect(knapsack.getItem(2)).toEqual(new Item(3, 9, 1));
    expect(knapsack.capacity).toBe(10);
  });

  it('should accept CRLF line endings and a missing final newline', () => {
    const knapsack = parseKnapsack('1\r\n4 5 6\r\n7');
    expect(knapsack.items).toEqual([new Item(4, 5, 6)]);
    expect(knapsack.capacity).toBe(7);
  });

  it('should ignore content after the capacity line', () => {
    const knapsack = parseKnapsack('1\n1 2 3\n4\nnot part of the instance\n');
    expect(knapsack.capacity).toBe(4);
  });

  it('should parse a zero-item instance', () => {
    const knapsack = parseKnapsack('0\n0\n');
    expect(knapsack.numItems).toBe(0);
    expect(knapsack.capacity).toBe(0);
  });

  it('should reject an empty input', () => {
    expect(() => parseKnapsack('', 'empty.txt')).toThrow('The input empty.txt was empty');
  });

  it('should reject a non-numeric item count', () => {
    expect(() => parseKnapsack('three\n')).toThrow(InstanceFormatError);
  });

  it('should reject fewer item lines than declared', () => {
    expect(() => parseKnapsack('3\n1 3 8\n2 2 8\n')).toThrow(
      'Expected 3 item lines in <input> but only found 2; is the number of items on the first line correct?',
    );
  });

  it('should reject an item line with two fields', () => {
    expect(() => parseKnapsack('2\n1 3 8\n2 2\n10\n')).toThrow(
      "The item specification line '2 2' should have had 3 whitespace separated fields, found 2",
    );
  });

  it('should reject an item line with a non-numeric field', () => {
    expect(() => parseKnapsack('1\n1 three 8\n10\n')).toThrow(InstanceFormatError);
  });

  it('should reject a missing capacity line', () => {
    expect(() => parseKnapsack('1\n1 3 8\n')).toThrow('There was no capacity line in <input>');
  });

  it('should reject a non-numeric capacity', () => {
    expect(() => parseKnapsack('1\n1 3 8\nten\n')).toThrow(
      "The capacity 'ten' on line 3 of <input> is not an unsigned integer",
    );
  });

  it('should reject items whose total value cannot be summed exactly', () => {
    expect(() => parseKnapsack('2\n1 9007199254740991 1\n2 1 1\n5\n')).toThrow(
      'The item totals in <input> exceed 9007199254740991 and cannot be summed exactly',
    );
  });

  it('should reject items whose total weight cannot be summed exactly', () => {
    expect(() => parseKnapsack('2\n1 1 9007199254740991\n2 1 9\n5\n')).toThrow(InstanceFormatError);
  });

  it('should treat a padded count line as malformed', () => {
    expect(() => parseKnapsack(' 1\n1 3 8\n10\n')).toThrow(InstanceFormatError);
  });
});

describe('serializeKnapsack', () => {
  it('should write the instance file format', () => {
    const knapsack = new Knapsack([new Item(1, 3, 8), new Item(2, 2, 8)], 10);
    expect(serializeKnapsack(knapsack)).toBe('2\n1 3 8\n2 2 8\n10\n');
  });

  it('should parse back to an equal instance', () => {
    const original = new Knapsack([new Item(5, 0, 4), new Item(6, 11, 0)], 0);
    const reparsed = parseKnapsack(serializeKnapsack(original));
    expect(reparsed.items).toEqual(original.items);
    expect(reparsed.capacity).toBe(original.capacity);
  });
});

describe('loadKnapsack', () => {
  let workDir: string;

  beforeAll(() => {
    workDir = mkdtempSync(join(tmpdir(), 'cliff-knapsack-loader-'));
  });

  afterAll(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('should load an instance from a file', () => {
    const knapsack = loadKnapsack(join(FIXTURES, 'tiny.txt'));
    expect(knapsack.items).toEqual([new Item(1, 3, 8), new Item(2, 2, 8), new Item(3, 9, 1)]);
    expect(knapsack.capacity).toBe(10);
  });

  it('should report a missing file as an IO error', () => {
    const missing = join(workDir, 'missing.txt');
    try {
      loadKnapsack(missing);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InstanceIoError);
      if (err instanceof InstanceIoError) {
        expect(err.path).toBe(missing);
        expect(err.code).toBe('IO_ERROR');
      }
    }
  });

  it('should report a malformed file as a format error', () => {
    expect(() => loadKnapsack(join(FIXTURES, 'short-item-line.txt'))).toThrow(InstanceFormatError);
  });
});
