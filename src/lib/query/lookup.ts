/**
 * Neighborhood lookup around an operating point.
 */

import type { LookupTable } from '../core/types.js';
import { CellOffset } from '../core/offset.js';
import { fail } from '../core/failure.js';

/**
 * Find the offset whose coordinate is nearest to `value`.
 *
 * Coordinates must be ascending. Values outside the coordinate span clamp
 * to the first or last offset. When `value` is exactly halfway between two
 * coordinates the lower offset wins.
 */
export function nearestOffset(coords: ReadonlyArray<number>, value: number): number {
  const last = coords.length - 1;

  if (value <= coords[0]) {
    return 0;
  }
  if (value >= coords[last]) {
    return last;
  }

  for (let i = 0; i < last; i++) {
    const low = coords[i];
    const high = coords[i + 1];
    if (value >= low && value < high) {
      return value - low > high - value ? i + 1 : i;
    }
  }

  // Only reached when the coordinates are not ascending
  return last;
}

/**
 * Clamp `[center - range, center + range]` to `[0, size - 1]` and list it.
 */
function offsetSpan(center: number, range: number, size: number): number[] {
  const start = Math.max(0, center - range);
  const end = Math.min(size - 1, center + range);
  const span: number[] = [];
  for (let i = start; i <= end; i++) {
    span.push(i);
  }
  return span;
}

/**
 * Select the cells within `range` offsets of the cell nearest to
 * (`xValue`, `yValue`).
 *
 * Used to pick a neighborhood of calibration cells around an operating
 * point, e.g. every cell near 2000 rpm / 85 kPa.
 *
 * @param range - Offset distance on each axis (0 selects just the nearest cell)
 * @returns Offsets ordered by x, then by y, both ascending
 * @throws TableError INVALID_ARGUMENT if range is not a non-negative integer
 *
 * @example
 * // x coords [1000, 1500, 2000, 2500, 3000], y coords [60, 70, 80, 90, 100]
 * lookupPoints(table, 2010, 85, 1)
 * // 9 offsets: x in {1, 2, 3} by y in {1, 2, 3}
 */
export function lookupPoints(
  table: LookupTable,
  xValue: number,
  yValue: number,
  range: number
): CellOffset[] {
  if (!Number.isInteger(range) || range < 0) {
    fail('INVALID_ARGUMENT', `range must be a non-negative integer, got ${range}`);
  }

  const xNearest = nearestOffset(table.getXCoords(), xValue);
  const yNearest = nearestOffset(table.getYCoords(), yValue);

  const points: CellOffset[] = [];
  for (const x of offsetSpan(xNearest, range, table.cols)) {
    for (const y of offsetSpan(yNearest, range, table.rows)) {
      points.push(new CellOffset(x, y));
    }
  }
  return points;
}
