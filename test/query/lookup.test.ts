/**
 * Tests for nearest-offset search and neighborhood lookup.
 */

import { describe, it, expect } from 'vitest';
import { lookupPoints, nearestOffset } from '../../src/lib/query/lookup.js';
import { CellOffset } from '../../src/lib/core/offset.js';
import { TableError } from '../../src/lib/core/failure.js';
import { buildTable } from '../../src/lib/core/types.js';
import { makeEngineMap } from '../fixtures/helpers.js';

function keys(points: CellOffset[]): string[] {
  return points.map(p => p.toKey());
}

describe('TestNearestOffset', () => {
  const coords = [10, 20, 30];

  it('test_clamps_below_and_above', () => {
    expect(nearestOffset(coords, 5)).toBe(0);
    expect(nearestOffset(coords, 10)).toBe(0);
    expect(nearestOffset(coords, 30)).toBe(2);
    expect(nearestOffset(coords, 1000)).toBe(2);
  });

  it('test_picks_closer_neighbour', () => {
    expect(nearestOffset(coords, 14)).toBe(0);
    expect(nearestOffset(coords, 16)).toBe(1);
    expect(nearestOffset(coords, 20)).toBe(1);
    expect(nearestOffset(coords, 24)).toBe(1);
    expect(nearestOffset(coords, 26)).toBe(2);
  });

  it('test_tie_goes_to_lower_offset', () => {
    expect(nearestOffset(coords, 15)).toBe(0);
    expect(nearestOffset(coords, 25)).toBe(1);
  });

  it('test_single_coordinate', () => {
    expect(nearestOffset([7], -3)).toBe(0);
    expect(nearestOffset([7], 7)).toBe(0);
    expect(nearestOffset([7], 99)).toBe(0);
  });
});

describe('TestLookupPoints', () => {
  it('test_lookup_centered_neighbourhood', () => {
    const table = makeEngineMap();
    const points = table.lookupPoints(2010, 85, 1);

    expect(points).toHaveLength(9);
    expect(keys(points)).toEqual([
      '1,1', '1,2', '1,3',
      '2,1', '2,2', '2,3',
      '3,1', '3,2', '3,3',
    ]);
  });

  it('test_lookup_range_zero_is_nearest_cell', () => {
    const table = makeEngineMap();
    expect(keys(lookupPoints(table, 2400, 61, 0))).toEqual(['3,0']);
  });

  it('test_lookup_clamped_at_corner', () => {
    const table = makeEngineMap();
    const points = table.lookupPoints(900, 200, 1);
    expect(keys(points)).toEqual(['0,3', '0,4', '1,3', '1,4']);
  });

  it('test_lookup_range_larger_than_table', () => {
    const table = makeEngineMap();
    const points = table.lookupPoints(2000, 80, 10);
    expect(points).toHaveLength(25);
    expect(points[0].equals(new CellOffset(0, 0))).toBe(true);
    expect(points[24].equals(new CellOffset(4, 4))).toBe(true);
  });

  it('test_lookup_count_without_clamping', () => {
    const table = buildTable(9, 7, 'x', 'y');
    table.setXCoords([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    table.setYCoords([1, 2, 3, 4, 5, 6, 7]);

    for (const range of [0, 1, 2, 3]) {
      const points = table.lookupPoints(5, 4, range);
      expect(points).toHaveLength((2 * range + 1) * (2 * range + 1));
    }
  });

  it('test_lookup_default_range_is_zero', () => {
    const table = makeEngineMap();
    expect(keys(table.lookupPoints(3000, 100))).toEqual(['4,4']);
  });

  it('test_lookup_rejects_bad_range', () => {
    const table = makeEngineMap();
    expect(() => table.lookupPoints(2000, 80, -1)).toThrow(TableError);
    expect(() => table.lookupPoints(2000, 80, 1.5)).toThrow(TableError);
  });
});
