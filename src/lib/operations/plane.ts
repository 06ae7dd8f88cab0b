/**
 * Fill a table from the equation of a plane.
 */

import type { LookupTable } from '../core/types.js';
import { fail } from '../core/failure.js';

/**
 * Constants of the plane z = a * y + b * x + c.
 */
export interface PlaneConstants {
  readonly a: number;
  readonly b: number;
  readonly c: number;
}

/**
 * Truncate `value` toward zero, keeping `digits` decimal places.
 */
export function truncateDigits(value: number, digits: number): number {
  const scale = 10 ** digits;
  return Math.trunc(value * scale) / scale;
}

/**
 * Overwrite every cell with the plane evaluated at the cell's coordinates.
 *
 * Handy for seeding a fresh calibration map before hand tuning it.
 *
 * @param table - Table to fill in place
 * @param plane - Plane constants, z = a * y + b * x + c
 * @param digits - Decimal places kept (values are truncated, not rounded)
 * @returns The same table
 * @throws TableError INVALID_ARGUMENT if digits is not a non-negative integer
 *   or the plane is not finite at some cell; the table is then left untouched
 */
export function fillPlane(table: LookupTable, plane: PlaneConstants, digits = 2): LookupTable {
  if (!Number.isInteger(digits) || digits < 0) {
    fail('INVALID_ARGUMENT', `digits must be a non-negative integer, got ${digits}`);
  }

  const xCoords = table.getXCoords();
  const yCoords = table.getYCoords();

  const filled: number[][] = [];
  for (let x = 0; x < table.cols; x++) {
    const column: number[] = [];
    for (let y = 0; y < table.rows; y++) {
      const value = truncateDigits(plane.a * yCoords[y] + plane.b * xCoords[x] + plane.c, digits);
      if (!Number.isFinite(value)) {
        fail('INVALID_ARGUMENT', `Plane gives ${value} at x offset ${x}, y offset ${y}`);
      }
      column.push(value);
    }
    filled.push(column);
  }

  filled.forEach((column, x) => column.forEach((value, y) => table.set(x, y, value)));

  return table;
}
