/**
 * Comparison of table values and coordinate lists.
 */

import type { Axis, LookupTable } from '../core/types.js';
import { CellOffset } from '../core/offset.js';
import { fail } from '../core/failure.js';

/**
 * Compare the values of two equally sized tables cell by cell.
 *
 * Scans x offsets in the outer loop and y offsets in the inner loop.
 *
 * @param stopEarly - Return `true` as soon as one differing cell is found
 * @returns Whether any cell differs (stopEarly), or every differing offset
 * @throws TableError DIMENSION_MISMATCH if the sizes differ
 */
export function diffValues(
  a: LookupTable,
  b: LookupTable,
  stopEarly: boolean
): CellOffset[] | boolean {
  if (a.cols !== b.cols || a.rows !== b.rows) {
    fail(
      'DIMENSION_MISMATCH',
      `Cannot compare a ${a.cols}x${a.rows} table with a ${b.cols}x${b.rows} table`
    );
  }

  const differing: CellOffset[] = [];

  for (let x = 0; x < a.cols; x++) {
    const ys1 = a.getYVals(x);
    const ys2 = b.getYVals(x);

    for (let y = 0; y < a.rows; y++) {
      if (ys1[y] !== ys2[y]) {
        if (stopEarly) {
          return true;
        }
        differing.push(new CellOffset(x, y));
      }
    }
  }

  return stopEarly ? false : differing;
}

/**
 * Offsets at which two coordinate lists hold different numbers.
 *
 * @throws TableError DIMENSION_MISMATCH if the lists differ in length
 */
export function diffCoords(
  axis: Axis,
  coords1: ReadonlyArray<number>,
  coords2: ReadonlyArray<number>
): number[] {
  if (coords1.length !== coords2.length) {
    fail(
      'DIMENSION_MISMATCH',
      `Cannot compare ${coords1.length} ${axis} coordinates with ${coords2.length}`
    );
  }

  const offsets: number[] = [];
  for (let i = 0; i < coords1.length; i++) {
    if (coords1[i] !== coords2[i]) {
      offsets.push(i);
    }
  }
  return offsets;
}
