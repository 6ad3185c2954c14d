/**
 * CSV decoding with csv-parse.
 */

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import type { RawTable } from '../../core/parse-tables.js';

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));

/**
 * Decodes CSV text into its header and records. The first non-empty line is
 * the header; rows may be shorter or longer than it.
 *
 * @returns the parser's message when the text is not valid CSV
 */
export const decodeCsv = (content: string): Result<RawTable, string> => {
  let decoded: unknown;
  try {
    decoded = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }

  if (!isStringMatrix(decoded)) {
    return err('Unexpected CSV parser output');
  }

  const [header, ...body] = decoded;
  if (header === undefined) {
    return ok({ columns: [], records: [] });
  }

  const columns = header.map((name) => name.trim());
  // On a repeated column name the first occurrence wins
  const positions = columns
    .map((name, position) => [name, position] as const)
    .filter(([name, position]) => columns.indexOf(name) === position);

  const records = body.map((row) =>
    Object.fromEntries(
      positions.flatMap(([name, position]) => {
        const cell = row[position];
        return cell === undefined ? [] : [[name, cell] as const];
      })
    )
  );

  return ok({ columns, records });
};
