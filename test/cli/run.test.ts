/**
 * End-to-end tests for the CLI commands, run in process against a temp dir.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { run, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, HELP_TEXT } from '../../src/cli/run.js';
import { loadTableFile } from '../../src/lib/io/table-file.js';
import { exportTable, parseTable } from '../../src/lib/parser/parser.js';
import { makeTempDir, readFixture } from '../fixtures/helpers.js';

let dir: string;
function silence(method: 'log' | 'warn' | 'error') {
  return vi.spyOn(console, method).mockImplementation(() => {});
}

let logSpy: ReturnType<typeof silence>;
let warnSpy: ReturnType<typeof silence>;
let errorSpy: ReturnType<typeof silence>;

function output(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map(call => String(call[0]));
}

function writeFixture(name: string): string {
  const path = join(dir, name);
  writeFileSync(path, readFixture('ignition.tbl'));
  return path;
}

beforeEach(() => {
  dir = makeTempDir();
  logSpy = silence('log');
  warnSpy = silence('warn');
  errorSpy = silence('error');
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe('TestHelp', () => {
  it('test_help_exits_ok', () => {
    expect(run(['--help'], dir)).toBe(EXIT_OK);
    expect(output(logSpy)).toEqual([HELP_TEXT]);
  });

  it('test_no_command_is_usage_error', () => {
    expect(run([], dir)).toBe(EXIT_USAGE);
    expect(output(logSpy)).toEqual([HELP_TEXT]);
  });
});

describe('TestCommands', () => {
  it('test_show_prints_canonical_text', () => {
    writeFixture('ign.tbl');
    expect(run(['show', 'ign.tbl'], dir)).toBe(EXIT_OK);
    expect(output(logSpy)).toEqual([exportTable(parseTable(readFixture('ignition.tbl')))]);
  });

  it('test_new_creates_zero_table', () => {
    expect(run(['new', 'fresh.tbl', '2', '1', 'rpm', 'map'], dir)).toBe(EXIT_OK);
    expect(output(logSpy)).toEqual(['Created 2 x 1 table fresh.tbl']);
    expect(readFileSync(join(dir, 'fresh.tbl'), 'utf8')).toBe(
      '\n         rpm\n\n map         [0]  [0]\n       [0]   0    0\n'
    );
  });

  it('test_lookup_lists_nearest_cell', () => {
    writeFixture('ign.tbl');
    expect(run(['lookup', 'ign.tbl', '1900', '75'], dir)).toBe(EXIT_OK);
    expect(output(logSpy)).toEqual(['x=1 y=1 [2000, 70]: 28']);
  });

  it('test_lookup_with_range', () => {
    writeFixture('ign.tbl');
    expect(run(['lookup', 'ign.tbl', '900', '30', '--range', '1'], dir)).toBe(EXIT_OK);
    expect(output(logSpy)).toEqual([
      'x=0 y=0 [1000, 40]: 26',
      'x=0 y=1 [1000, 70]: 22',
      'x=1 y=0 [2000, 40]: 32',
      'x=1 y=1 [2000, 70]: 28',
    ]);
  });

  it('test_nudge_adds_delta_and_saves', () => {
    const path = writeFixture('ign.tbl');
    expect(run(['nudge', 'ign.tbl', '2000', '70', '-1.5', '-r', '1'], dir)).toBe(EXIT_OK);
    expect(output(logSpy)).toEqual(['Adjusted 9 cells of ign.tbl']);

    const table = loadTableFile(path);
    expect(table.get(1, 1)).toBe(26.5);
    expect(table.get(2, 1)).toBe(33);
    expect(table.get(0, 2)).toBe(16.5);
  });

  it('test_plane_fills_and_truncates', () => {
    const path = writeFixture('ign.tbl');
    expect(run(['plane', 'ign.tbl', '0.5', '0.25', '1.5', '0'], dir)).toBe(EXIT_OK);
    expect(output(logSpy)).toEqual(['Filled 9 cells of ign.tbl']);

    const table = loadTableFile(path);
    // 0.5 * 40 + 0.25 * 1000 + 1.5 = 271.5
    expect(table.get(0, 0)).toBe(271);
    // 0.5 * 100 + 0.25 * 3000 + 1.5 = 801.5
    expect(table.get(2, 2)).toBe(801);
  });

  it('test_diff_lists_changed_cells', () => {
    writeFixture('a.tbl');
    writeFixture('b.tbl');
    run(['nudge', 'b.tbl', '1000', '40', '1'], dir);
    logSpy.mockClear();

    expect(run(['diff', 'a.tbl', 'b.tbl'], dir)).toBe(EXIT_OK);
    expect(output(logSpy)).toEqual(['x=0 y=0: 26 -> 27']);
  });

  it('test_diff_identical_files', () => {
    writeFixture('a.tbl');
    writeFixture('b.tbl');
    expect(run(['diff', 'a.tbl', 'b.tbl'], dir)).toBe(EXIT_OK);
    expect(output(logSpy)).toEqual(['No differences']);
  });

  it('test_plot_uses_configured_format', () => {
    writeFixture('ign.tbl');
    writeFileSync(join(dir, 'lutgrid.config.json5'), "{ plotFormat: 'R-fit', zLabel: 'advance' }");

    expect(run(['plot', 'ign.tbl'], dir)).toBe(EXIT_OK);
    const [script] = output(logSpy);
    expect(script.split('\n')).toContain('fit <- lsfit(cbind(x, y), z)');
    expect(script).toContain('zlab="advance"');
  });

  it('test_plot_format_option_overrides_config', () => {
    writeFixture('ign.tbl');
    writeFileSync(join(dir, 'lutgrid.config.json5'), "{ plotFormat: 'R-fit' }");

    expect(run(['plot', 'ign.tbl', '--format', 'R'], dir)).toBe(EXIT_OK);
    expect(output(logSpy)[0].split('\n')).toContain('dim(z) <- c(3, 3)');
  });
});

describe('TestErrors', () => {
  it('test_unknown_command', () => {
    expect(run(['frobnicate'], dir)).toBe(EXIT_USAGE);
    expect(output(errorSpy)).toEqual(['Error: Unknown command: frobnicate']);
  });

  it('test_wrong_argument_count', () => {
    expect(run(['show'], dir)).toBe(EXIT_USAGE);
    expect(output(errorSpy)).toEqual(['Error: usage: lutgrid show <file>']);
  });

  it('test_bad_plot_format', () => {
    writeFixture('ign.tbl');
    expect(run(['plot', 'ign.tbl', '-f', 'svg'], dir)).toBe(EXIT_USAGE);
    expect(output(errorSpy)).toEqual(['Error: Unknown plot format: svg (expected R or R-fit)']);
  });

  it('test_missing_file', () => {
    expect(run(['show', 'missing.tbl'], dir)).toBe(EXIT_FAILURE);
    expect(output(errorSpy)).toEqual([
      `Error: NOT_FOUND: File '${join(dir, 'missing.tbl')}' does not exist`,
    ]);
  });

  it('test_malformed_file_reports_line', () => {
    writeFileSync(join(dir, 'bad.tbl'), '[1] [2]\n[5] 1 abc\n');
    expect(run(['show', 'bad.tbl'], dir)).toBe(EXIT_FAILURE);
    expect(output(errorSpy)).toEqual(["Error: FORMAT on line 2: value 'abc' is not a number"]);
  });

  it('test_unknown_setting_warns', () => {
    writeFixture('ign.tbl');
    writeFileSync(join(dir, 'lutgrid.config.json5'), "{ colour: 'red' }");

    expect(run(['lookup', 'ign.tbl', '1000', '40'], dir)).toBe(EXIT_OK);
    expect(output(warnSpy)).toEqual([
      "Warning: lutgrid.config.json5: unknown setting 'colour' ignored",
    ]);
  });

  it('test_invalid_settings_fail', () => {
    writeFixture('ign.tbl');
    writeFileSync(join(dir, 'lutgrid.config.json5'), '{ range: -1 }');

    expect(run(['lookup', 'ign.tbl', '1000', '40'], dir)).toBe(EXIT_FAILURE);
    expect(output(errorSpy)).toEqual([
      "Error: lutgrid.config.json5: 'range' must be a non-negative integer",
    ]);
  });
});
