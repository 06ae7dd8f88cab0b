/**
 * lutgrid command implementations.
 */

import { resolve } from 'node:path';
import { buildTable, type LookupTable } from '../lib/core/types.js';
import { TableError, describeFailure } from '../lib/core/failure.js';
import { exportTable } from '../lib/parser/parser.js';
import { loadTableFile, saveTableFile } from '../lib/io/table-file.js';
import { renderPlot, isPlotFormat, type PlotFormat } from '../lib/plot/r-script.js';
import { fillPlane } from '../lib/operations/plane.js';
import { adjustPoints } from '../lib/operations/adjust.js';
import { parseArgs, UsageError, type CLIArgs } from './args.js';
import { loadConfig, type CLIConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const HELP_TEXT = `
lutgrid - text look up tables

USAGE:
  lutgrid <command> [arguments] [options]

COMMANDS:
  show <file>                              Print the table in canonical layout
  new <file> <xSize> <ySize> <xTitle> <yTitle>
                                           Create a zero filled table
  plot <file>                              Print an R plot script
  plane <file> <a> <b> <c> [digits]        Fill with z = a*y + b*x + c, truncated to digits
  lookup <file> <x> <y>                    List the cells near coordinates (x, y)
  nudge <file> <x> <y> <delta>             Add delta to the cells near (x, y)
  diff <fileA> <fileB>                     List cells and coordinates that differ

OPTIONS:
  --format, -f <R|R-fit>  Plot script flavour (plot)
  --range, -r <n>         Neighborhood range in offsets (lookup, nudge)
  --config <path>         Settings file (default: ./lutgrid.config.json5)
  --verbose, -v           Print diagnostics to stderr
  --help, -h              Show this help message
`;

interface CommandContext {
  readonly args: CLIArgs;
  readonly config: CLIConfig;
  readonly logger: Logger;
  readonly cwd: string;
}

function expectArgs(ctx: CommandContext, min: number, max: number, usage: string): string[] {
  const { positional } = ctx.args;
  if (positional.length < min || positional.length > max) {
    throw new UsageError(`usage: lutgrid ${usage}`);
  }
  return positional;
}

function numberArg(value: string, name: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new UsageError(`${name} must be a number, got '${value}'`);
  }
  return n;
}

function integerArg(value: string, name: string): number {
  const n = numberArg(value, name);
  if (!Number.isInteger(n) || n < 0) {
    throw new UsageError(`${name} must be a non-negative integer, got '${value}'`);
  }
  return n;
}

function load(ctx: CommandContext, file: string): LookupTable {
  const path = resolve(ctx.cwd, file);
  ctx.logger.debug(`loading ${path}`);
  return loadTableFile(path);
}

function save(ctx: CommandContext, table: LookupTable, file?: string): void {
  const written = saveTableFile(table, file === undefined ? undefined : resolve(ctx.cwd, file));
  ctx.logger.debug(`saved ${written}`);
}

function rangeOf(ctx: CommandContext): number {
  return ctx.args.range !== undefined ? integerArg(ctx.args.range, 'range') : ctx.config.range;
}

function formatOf(ctx: CommandContext): PlotFormat {
  const format = ctx.args.format;
  if (format === undefined) {
    return ctx.config.plotFormat;
  }
  if (!isPlotFormat(format)) {
    throw new UsageError(`Unknown plot format: ${format} (expected R or R-fit)`);
  }
  return format;
}

// =============================================================================
// Commands
// =============================================================================

function showCommand(ctx: CommandContext): void {
  const [file] = expectArgs(ctx, 1, 1, 'show <file>');
  ctx.logger.info(exportTable(load(ctx, file)));
}

function newCommand(ctx: CommandContext): void {
  const [file, xSize, ySize, xTitle, yTitle] = expectArgs(
    ctx, 5, 5, 'new <file> <xSize> <ySize> <xTitle> <yTitle>'
  );
  const table = buildTable(integerArg(xSize, 'xSize'), integerArg(ySize, 'ySize'), xTitle, yTitle);
  save(ctx, table, file);
  ctx.logger.info(`Created ${table.cols} x ${table.rows} table ${file}`);
}

function plotCommand(ctx: CommandContext): void {
  const [file] = expectArgs(ctx, 1, 1, 'plot <file> [--format R|R-fit]');
  const table = load(ctx, file);
  ctx.logger.info(renderPlot(table, formatOf(ctx), { zLabel: ctx.config.zLabel }));
}

function planeCommand(ctx: CommandContext): void {
  const [file, a, b, c, digits] = expectArgs(ctx, 4, 5, 'plane <file> <a> <b> <c> [digits]');
  const table = load(ctx, file);
  fillPlane(
    table,
    { a: numberArg(a, 'a'), b: numberArg(b, 'b'), c: numberArg(c, 'c') },
    digits !== undefined ? integerArg(digits, 'digits') : ctx.config.roundDigits
  );
  save(ctx, table);
  ctx.logger.info(`Filled ${table.cols * table.rows} cells of ${file}`);
}

function lookupCommand(ctx: CommandContext): void {
  const [file, x, y] = expectArgs(ctx, 3, 3, 'lookup <file> <x> <y> [--range n]');
  const table = load(ctx, file);
  const xCoords = table.getXCoords();
  const yCoords = table.getYCoords();

  for (const point of table.lookupPoints(numberArg(x, 'x'), numberArg(y, 'y'), rangeOf(ctx))) {
    ctx.logger.info(
      `x=${point.x} y=${point.y} [${xCoords[point.x]}, ${yCoords[point.y]}]: ${table.get(point.x, point.y)}`
    );
  }
}

function nudgeCommand(ctx: CommandContext): void {
  const [file, x, y, delta] = expectArgs(ctx, 4, 4, 'nudge <file> <x> <y> <delta> [--range n]');
  const table = load(ctx, file);
  const points = table.lookupPoints(numberArg(x, 'x'), numberArg(y, 'y'), rangeOf(ctx));
  const count = adjustPoints(table, points, numberArg(delta, 'delta'));
  save(ctx, table);
  ctx.logger.info(`Adjusted ${count} cells of ${file}`);
}

function diffCommand(ctx: CommandContext): void {
  const [fileA, fileB] = expectArgs(ctx, 2, 2, 'diff <fileA> <fileB>');
  const a = load(ctx, fileA);
  const b = load(ctx, fileB);

  const lines: string[] = [];
  for (const offset of a.diffXCoords(b)) {
    lines.push(`x coordinate ${offset}: ${a.getXCoords()[offset]} -> ${b.getXCoords()[offset]}`);
  }
  for (const offset of a.diffYCoords(b)) {
    lines.push(`y coordinate ${offset}: ${a.getYCoords()[offset]} -> ${b.getYCoords()[offset]}`);
  }
  for (const cell of a.diff(b)) {
    lines.push(`x=${cell.x} y=${cell.y}: ${a.get(cell.x, cell.y)} -> ${b.get(cell.x, cell.y)}`);
  }

  if (lines.length === 0) {
    ctx.logger.info('No differences');
    return;
  }
  for (const line of lines) {
    ctx.logger.info(line);
  }
}

const COMMANDS: Record<NonNullable<CLIArgs['subcommand']>, (ctx: CommandContext) => void> = {
  show: showCommand,
  new: newCommand,
  plot: plotCommand,
  plane: planeCommand,
  lookup: lookupCommand,
  nudge: nudgeCommand,
  diff: diffCommand,
};

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Run the CLI with the given arguments (without the node and script paths).
 *
 * @param cwd - Directory that relative file and config paths resolve against
 * @returns Process exit status
 */
export function run(argv: string[], cwd: string = process.cwd()): number {
  let logger = createLogger(false);

  try {
    const args = parseArgs(argv);
    logger = createLogger(args.verbose);

    if (args.help || args.subcommand === undefined) {
      logger.info(HELP_TEXT);
      return args.help ? EXIT_OK : EXIT_USAGE;
    }

    const loaded = loadConfig(args.configPath, cwd);
    for (const warning of loaded.warnings) {
      logger.warn(warning);
    }
    logger.debug(`settings from ${loaded.source ?? 'defaults'}`);

    COMMANDS[args.subcommand]({ args, config: loaded.config, logger, cwd });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(error.message);
      return EXIT_USAGE;
    }
    if (error instanceof TableError) {
      logger.error(describeFailure(error.failure));
      return EXIT_FAILURE;
    }
    if (error instanceof Error) {
      logger.error(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
