/**
 * Load tables from, and save them to, text files.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import type { LookupTable } from '../core/types.js';
import { attempt, fail, type TableFailure } from '../core/failure.js';
import { exportTable, parseTable } from '../parser/parser.js';

/**
 * Read and parse a table file. The path is remembered on the table so
 * saveTableFile can be called without one.
 *
 * @throws TableError NOT_FOUND if the file does not exist, FORMAT if it does not parse
 */
export function loadTableFile(path: string): LookupTable {
  if (!existsSync(path)) {
    fail('NOT_FOUND', `File '${path}' does not exist`);
  }

  const table = parseTable(readFileSync(path, 'utf8'));
  table.filePath = path;
  return table;
}

/**
 * Like loadTableFile, but returns the failure instead of throwing it.
 */
export function tryLoadTableFile(path: string): LookupTable | TableFailure {
  return attempt(() => loadTableFile(path));
}

/**
 * Write a table to `path`, or to the last file it was loaded from or saved to.
 *
 * @returns The path written
 * @throws TableError NO_FILE_SPECIFIED if there is no path to use
 */
export function saveTableFile(table: LookupTable, path?: string): string {
  const target = path ?? table.filePath;
  if (target === undefined || target.trim() === '') {
    fail('NO_FILE_SPECIFIED', 'Trying to save but no file specified and no file stored');
  }

  // Render first so a LAYOUT failure leaves the file untouched
  const text = exportTable(table);
  writeFileSync(target, text, 'utf8');
  table.filePath = target;
  return target;
}
