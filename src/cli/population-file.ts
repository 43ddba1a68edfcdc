import { readFileSync } from 'fs';
import { z } from 'zod';
import { PopulationFileError } from '../core/errors.js';
import { parseChoices } from '../knapsack/choices.js';
import { LineCursor } from '../knapsack/line-cursor.js';

const GenerationLineSchema = z
  .array(z.string().regex(/^[01]*$/, 'candidates must be strings of 0 and 1'))
  .min(1, 'a generation needs at least one candidate');

/**
 * Read a JSON Lines file with one generation per line, each an array of bit
 * strings such as `["0110", "1010"]`. Blank lines are skipped.
 */
export function readPopulationFile(filePath: string): boolean[][][] {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const cause = err instanceof Error ? err : undefined;
    throw new PopulationFileError(
      `Failed to read population file ${filePath}: ${cause?.message ?? String(err)}`,
      filePath,
      undefined,
      cause,
    );
  }
  return parsePopulationLines(text, filePath);
}

export function parsePopulationLines(text: string, source: string = '<input>'): boolean[][][] {
  const cursor = new LineCursor(text);
  const generations: boolean[][][] = [];

  for (let line = cursor.next(); line !== null; line = cursor.next()) {
    if (line.text.trim() === '') continue;

    let json: unknown;
    try {
      json = JSON.parse(line.text);
    } catch (err) {
      throw new PopulationFileError(
        `Line ${line.number} of ${source} is not valid JSON`,
        source,
        line.number,
        err instanceof Error ? err : undefined,
      );
    }

    const parsed = GenerationLineSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0]?.message ?? parsed.error.message;
      throw new PopulationFileError(`Line ${line.number} of ${source}: ${issue}`, source, line.number, parsed.error);
    }

    generations.push(parsed.data.map(bits => parseChoices(bits) ?? []));
  }

  if (generations.length === 0) {
    throw new PopulationFileError(`${source} does not contain any generations`, source);
  }
  return generations;
}
