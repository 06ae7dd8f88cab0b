/**
 * Batch edits over a set of cells.
 */

import { checkOffset, type LookupTable } from '../core/types.js';
import type { CellOffset } from '../core/offset.js';
import { fail } from '../core/failure.js';

/**
 * Add `delta` to every cell listed in `points`.
 *
 * Typically fed with the result of `lookupPoints`, e.g. to nudge every cell
 * near an operating point by +2. All offsets are checked before any cell is
 * changed, so a bad offset leaves the table untouched. An offset listed
 * twice is adjusted twice.
 *
 * @param table - Table to edit in place
 * @param points - Offsets of the cells to adjust
 * @param delta - Amount added to each cell
 * @returns Number of adjustments made
 * @throws TableError OUT_OF_RANGE if any offset lies outside the table,
 *   INVALID_ARGUMENT if delta is not finite
 */
export function adjustPoints(
  table: LookupTable,
  points: ReadonlyArray<CellOffset>,
  delta: number
): number {
  if (!Number.isFinite(delta)) {
    fail('INVALID_ARGUMENT', `delta must be a finite number, got ${delta}`);
  }
  for (const point of points) {
    checkOffset('x', point.x, table.cols);
    checkOffset('y', point.y, table.rows);
  }

  for (const point of points) {
    table.set(point.x, point.y, table.get(point.x, point.y) + delta);
  }

  return points.length;
}
