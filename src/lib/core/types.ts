/**
 * Core data structures for look up tables.
 */

import { fail } from './failure.js';
import type { CellOffset } from './offset.js';
import { diffCoords, diffValues } from '../query/diff.js';
import { lookupPoints } from '../query/lookup.js';

// =============================================================================
// Table Parts
// =============================================================================

/**
 * The plain data a LookupTable is made of.
 *
 * `values[y][x]` is the cell at x-offset x and y-offset y. Row 0 is the
 * bottom row of the displayed table, column 0 the leftmost.
 */
export interface TableParts {
  readonly xTitle: string;
  readonly yTitle: string;
  readonly xCoords: ReadonlyArray<number>;
  readonly yCoords: ReadonlyArray<number>;
  readonly values: ReadonlyArray<ReadonlyArray<number>>;
}

export type Axis = 'x' | 'y';

export function checkOffset(axis: Axis, offset: number, size: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset >= size) {
    fail('OUT_OF_RANGE', `${axis} offset ${offset} is beyond the boundary ${size - 1}`);
  }
}

// Titles must survive export and reparse: tokenize drops tokens without a
// word character, and a bracketed token reads as a coordinate.
function isTitleToken(title: string): boolean {
  return (
    title.length > 0 &&
    !/\s/.test(title) &&
    /\w/.test(title) &&
    !(title.startsWith('[') && title.endsWith(']'))
  );
}

function checkFinite(what: string, values: ReadonlyArray<number>): void {
  for (const value of values) {
    if (!Number.isFinite(value)) {
      fail('INVALID_ARGUMENT', `${what} must be finite numbers, got ${value}`);
    }
  }
}

// =============================================================================
// Look Up Table
// =============================================================================

/**
 * A rectangular table of numbers indexed by x and y coordinates.
 *
 * Tables are mutable and exclusively owned: accessors hand out copies, and
 * `copy()` shares nothing with the table it was copied from.
 */
export class LookupTable {
  xTitle: string;
  yTitle: string;
  /** Last path this table was loaded from or saved to. */
  filePath: string | undefined;

  private xCoords: number[];
  private yCoords: number[];
  private readonly values: number[][];

  constructor(parts: TableParts, filePath?: string) {
    const cols = parts.xCoords.length;
    const rows = parts.yCoords.length;

    if (cols === 0) {
      fail('INVALID_ARGUMENT', 'Table must have at least one column');
    }
    if (rows === 0) {
      fail('INVALID_ARGUMENT', 'Table must have at least one row');
    }
    if (parts.values.length !== rows) {
      fail('DIMENSION_MISMATCH', `Expected ${rows} rows of values, got ${parts.values.length}`);
    }

    checkFinite('x coordinates', parts.xCoords);
    checkFinite('y coordinates', parts.yCoords);

    // Verify rectangular structure
    for (let y = 0; y < rows; y++) {
      if (parts.values[y].length !== cols) {
        fail(
          'DIMENSION_MISMATCH',
          `Inconsistent row length at y offset ${y}: expected ${cols}, got ${parts.values[y].length}`
        );
      }
      checkFinite('Values', parts.values[y]);
    }

    this.xTitle = parts.xTitle;
    this.yTitle = parts.yTitle;
    this.xCoords = [...parts.xCoords];
    this.yCoords = [...parts.yCoords];
    this.values = parts.values.map(row => [...row]);
    this.filePath = filePath;
  }

  /** Number of columns (N). */
  get cols(): number {
    return this.xCoords.length;
  }

  /** Number of rows (M). */
  get rows(): number {
    return this.yCoords.length;
  }

  // ---------------------------------------------------------------------------
  // Cell access
  // ---------------------------------------------------------------------------

  get(x: number, y: number): number {
    checkOffset('x', x, this.cols);
    checkOffset('y', y, this.rows);
    return this.values[y][x];
  }

  set(x: number, y: number, value: number): void {
    checkOffset('x', x, this.cols);
    checkOffset('y', y, this.rows);
    checkFinite('Values', [value]);
    this.values[y][x] = value;
  }

  /**
   * All values at the given y offset, from left to right.
   */
  getXVals(y: number): number[] {
    checkOffset('y', y, this.rows);
    return [...this.values[y]];
  }

  /**
   * All values at the given x offset, from bottom to top.
   */
  getYVals(x: number): number[] {
    checkOffset('x', x, this.cols);
    return this.values.map(row => row[x]);
  }

  // ---------------------------------------------------------------------------
  // Coordinates
  // ---------------------------------------------------------------------------

  getXCoords(): number[] {
    return [...this.xCoords];
  }

  getYCoords(): number[] {
    return [...this.yCoords];
  }

  /**
   * Replace the x coordinates. Callers supply them ascending from the left;
   * they are stored as given.
   */
  setXCoords(coords: ReadonlyArray<number>): void {
    if (coords.length !== this.cols) {
      fail('DIMENSION_MISMATCH', `Expected ${this.cols} x coordinates, got ${coords.length}`);
    }
    checkFinite('x coordinates', coords);
    this.xCoords = [...coords];
  }

  /**
   * Replace the y coordinates. Callers supply them ascending from the bottom;
   * they are stored as given.
   */
  setYCoords(coords: ReadonlyArray<number>): void {
    if (coords.length !== this.rows) {
      fail('DIMENSION_MISMATCH', `Expected ${this.rows} y coordinates, got ${coords.length}`);
    }
    checkFinite('y coordinates', coords);
    this.yCoords = [...coords];
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Compare the values (not coordinates or titles) of two tables.
   *
   * With `stopEarly` the result is whether any cell differs. Otherwise every
   * differing offset is listed, x outer and y inner; an empty list means the
   * tables hold the same values.
   *
   * @throws TableError DIMENSION_MISMATCH if the tables differ in size
   */
  diff(other: LookupTable, stopEarly: true): boolean;
  diff(other: LookupTable, stopEarly?: false): CellOffset[];
  diff(other: LookupTable, stopEarly: boolean): CellOffset[] | boolean;
  diff(other: LookupTable, stopEarly = false): CellOffset[] | boolean {
    return diffValues(this, other, stopEarly);
  }

  /** Offsets whose x coordinates differ from `other`'s. */
  diffXCoords(other: LookupTable): number[] {
    return diffCoords('x', this.xCoords, other.getXCoords());
  }

  /** Offsets whose y coordinates differ from `other`'s. */
  diffYCoords(other: LookupTable): number[] {
    return diffCoords('y', this.yCoords, other.getYCoords());
  }

  /**
   * Offsets within `range` of the cell nearest to the given coordinates.
   * See {@link lookupPoints}.
   */
  lookupPoints(xValue: number, yValue: number, range = 0): CellOffset[] {
    return lookupPoints(this, xValue, yValue, range);
  }

  // ---------------------------------------------------------------------------
  // Copying
  // ---------------------------------------------------------------------------

  toParts(): TableParts {
    return {
      xTitle: this.xTitle,
      yTitle: this.yTitle,
      xCoords: this.getXCoords(),
      yCoords: this.getYCoords(),
      values: this.values.map(row => [...row]),
    };
  }

  copy(): LookupTable {
    return new LookupTable(this.toParts(), this.filePath);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a table of the given size with zero coordinates and zero values.
 *
 * @throws TableError INVALID_ARGUMENT for non-positive sizes or empty titles
 */
export function buildTable(
  xSize: number,
  ySize: number,
  xTitle: string,
  yTitle: string
): LookupTable {
  if (!Number.isInteger(xSize) || xSize < 1) {
    fail('INVALID_ARGUMENT', `x size must be a positive integer, got ${xSize}`);
  }
  if (!Number.isInteger(ySize) || ySize < 1) {
    fail('INVALID_ARGUMENT', `y size must be a positive integer, got ${ySize}`);
  }
  if (!isTitleToken(xTitle)) {
    fail('INVALID_ARGUMENT', `x title must be a single non-empty word, got '${xTitle}'`);
  }
  if (!isTitleToken(yTitle)) {
    fail('INVALID_ARGUMENT', `y title must be a single non-empty word, got '${yTitle}'`);
  }

  return new LookupTable({
    xTitle,
    yTitle,
    xCoords: new Array<number>(xSize).fill(0),
    yCoords: new Array<number>(ySize).fill(0),
    values: Array.from({ length: ySize }, () => new Array<number>(xSize).fill(0)),
  });
}

/**
 * Deep copy of a table. Mutating either one never affects the other.
 */
export function copyTable(table: LookupTable): LookupTable {
  return table.copy();
}
