/**
 * Parse look up tables from, and export them to, their text format.
 */

import { LookupTable } from '../core/types.js';
import { attempt, fail, type TableFailure } from '../core/failure.js';

/**
 * Separator placed between the columns of an exported table.
 */
const COLUMN_GAP = '  ';

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const BRACKETED_PATTERN = /^\[([^[\]]+)\]$/;

/**
 * Split a line into the tokens the format cares about.
 *
 * Runs of whitespace separate tokens; tokens without a single word
 * character are dropped.
 */
export function tokenize(line: string): string[] {
  return line.split(/\s+/).filter(part => /\w/.test(part));
}

function parseNumber(text: string): number | undefined {
  return NUMBER_PATTERN.test(text) ? Number(text) : undefined;
}

/**
 * Parse a `[number]` coordinate token, or return undefined if it is not one.
 */
function parseCoordinate(token: string): number | undefined {
  const match = BRACKETED_PATTERN.exec(token);
  return match ? parseNumber(match[1]) : undefined;
}

/**
 * Parse a look up table from its text format.
 *
 * Format:
 *
 *                        rpm
 *
 *              [1000]   [1500]  [2000]  [2500]
 *       [100]  14.0     15.5    16.4    17.9
 *  map  [90]   13.0     14.5    15.3    16.8
 *       [80]   12.0     13.5    14.2    15.7
 *
 * Lines are classified by their token count:
 * - 1 token before the coordinate row: the x title
 * - N bracketed tokens: the x coordinates, which fix N
 * - N + 1 tokens: `[y]` followed by N values
 * - N + 2 tokens: the y title, then a regular row
 * Blank lines are ignored and spacing is free. Rows are listed top to
 * bottom, so the last row in the text becomes y offset 0.
 *
 * @param text - Table text
 * @returns The parsed table
 * @throws TableError FORMAT with the offending line number
 */
export function parseTable(text: string): LookupTable {
  const lines = text.split(/\r?\n/);

  let xTitle: string | undefined;
  let yTitle: string | undefined;
  let xCoords: number[] | undefined;
  const yCoords: number[] = [];
  const rows: number[][] = [];

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const parts = tokenize(lines[i]);

    // skip blank lines
    if (parts.length === 0) {
      continue;
    }

    if (xCoords === undefined) {
      if (parts.length === 1 && parseCoordinate(parts[0]) === undefined) {
        if (xTitle !== undefined) {
          fail('FORMAT', 'multiple x-title lines', lineNo);
        }
        xTitle = parts[0];
        continue;
      }

      // A one-row table centers its y title on the coordinate line
      if (parts.length > 1 && parseCoordinate(parts[0]) === undefined) {
        yTitle = parts.shift();
      }

      xCoords = [];
      for (const part of parts) {
        const coord = parseCoordinate(part);
        if (coord === undefined) {
          fail('FORMAT', `x coordinate '${part}' is not a bracketed number`, lineNo);
        }
        xCoords.push(coord);
      }
      continue;
    }

    const numX = xCoords.length;

    if (parts.length === numX + 2) {
      if (yTitle !== undefined) {
        fail('FORMAT', 'multiple y-title lines', lineNo);
      }
      yTitle = parts.shift();
    }

    if (parts.length !== numX + 1) {
      fail('FORMAT', 'irregular data on this line or before', lineNo);
    }

    const yCoord = parseCoordinate(parts[0]);
    if (yCoord === undefined) {
      fail('FORMAT', `y coordinate '${parts[0]}' is not a bracketed number`, lineNo);
    }

    const row: number[] = [];
    for (const part of parts.slice(1)) {
      const value = parseNumber(part);
      if (value === undefined) {
        fail('FORMAT', `value '${part}' is not a number`, lineNo);
      }
      row.push(value);
    }

    yCoords.push(yCoord);
    rows.push(row);
  }

  if (xCoords === undefined || rows.length === 0) {
    fail('FORMAT', 'no data rows', lines.length);
  }

  // Rows were read top to bottom; offset 0 is the bottom row.
  return new LookupTable({
    xTitle: xTitle ?? '',
    yTitle: yTitle ?? '',
    xCoords,
    yCoords: yCoords.reverse(),
    values: rows.reverse(),
  });
}

/**
 * Like parseTable, but returns the failure instead of throwing it.
 */
export function tryParseTable(text: string): LookupTable | TableFailure {
  return attempt(() => parseTable(text));
}

function alignLeft(cells: string[]): string[] {
  const width = Math.max(...cells.map(cell => cell.length));
  return cells.map(cell => cell.padEnd(width));
}

/**
 * Export a table to the text format (inverse of parseTable).
 *
 * Columns are left aligned, the y title sits on the middle line and the
 * x title is centered over the body. Spacing of the source text is not
 * preserved, only its content.
 *
 * @param table - Table to export
 * @returns Table text, starting with a blank line and ending with a newline
 * @throws TableError LAYOUT if the x title is wider than the table body
 *
 * @example
 * exportTable(buildTable(2, 1, 'rpm', 'map'))
 * // "\n         rpm\n\n map         [0]  [0]\n       [0]   0    0\n"
 */
export function exportTable(table: LookupTable): string {
  const numX = table.cols;
  const numY = table.rows;
  const numLines = numY + 1; // add 1 for the x coordinates
  const titleLine = Math.floor(numY / 2);

  // Line 0 holds the x coordinates, line i holds y offset numY - i
  const yOffsetOf = (line: number): number => numY - line;

  const xCoords = table.getXCoords();
  const yCoords = table.getYCoords();

  const yTitleColumn: string[] = [];
  const yCoordColumn: string[] = [];
  for (let line = 0; line < numLines; line++) {
    yTitleColumn.push(line === titleLine ? ' ' + table.yTitle : ' ');
    yCoordColumn.push(line === 0 ? ' ' : ` [${yCoords[yOffsetOf(line)]}] `);
  }

  const columns: string[][] = [alignLeft(yTitleColumn), alignLeft(yCoordColumn)];
  for (let x = 0; x < numX; x++) {
    const ys = table.getYVals(x);
    const cells = [`[${xCoords[x]}]`];
    for (let line = 1; line < numLines; line++) {
      cells.push(String(ys[yOffsetOf(line)]));
    }
    columns.push(alignLeft(cells));
  }

  const lines: string[] = [];
  for (let line = 0; line < numLines; line++) {
    lines.push(columns.map(column => column[line]).join(COLUMN_GAP));
  }

  const width = lines[0].length;
  if (table.xTitle.length > width) {
    fail('LAYOUT', `x title is ${table.xTitle.length} characters wide, the table only ${width}`);
  }
  const fill = ' '.repeat(Math.floor((width - table.xTitle.length) / 2));

  const body = lines.map(line => line.trimEnd()).join('\n');
  return '\n' + (fill + table.xTitle).trimEnd() + '\n\n' + body + '\n';
}
