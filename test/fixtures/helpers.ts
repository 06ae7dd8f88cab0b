/**
 * Shared helpers for tests.
 */

import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { buildTable, type LookupTable } from '../../src/lib/core/types.js';

export const FIXTURES_DIR = fileURLToPath(new URL('.', import.meta.url));

export function readFixture(name: string): string {
  return readFileSync(join(FIXTURES_DIR, name), 'utf8');
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'lutgrid-'));
}

/**
 * A 5x5 table with x coords 1000..3000 (step 500), y coords 60..100 (step 10)
 * and each cell holding 10 * x + y.
 */
export function makeEngineMap(): LookupTable {
  const table = buildTable(5, 5, 'rpm', 'kPa');
  table.setXCoords([1000, 1500, 2000, 2500, 3000]);
  table.setYCoords([60, 70, 80, 90, 100]);
  for (let x = 0; x < 5; x++) {
    for (let y = 0; y < 5; y++) {
      table.set(x, y, 10 * x + y);
    }
  }
  return table;
}
