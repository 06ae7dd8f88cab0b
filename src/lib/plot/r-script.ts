/**
 * Export tables as R scripts for plotting.
 *
 * The scripts depend on the rgl package. Save the output to a file, start R
 * and run `source("<file>")`.
 */

import type { LookupTable } from '../core/types.js';
import { fail } from '../core/failure.js';

/**
 * Supported plot scripts.
 * - `R`: 3D surface of the table (rgl `persp3d`)
 * - `R-fit`: scatter of every cell with a least-squares plane fitted through it
 */
export type PlotFormat = 'R' | 'R-fit';

export const PLOT_FORMATS: ReadonlyArray<PlotFormat> = Object.freeze(['R', 'R-fit']);

export function isPlotFormat(value: string): value is PlotFormat {
  return PLOT_FORMATS.some(format => format === value);
}

export interface PlotOptions {
  /** Label of the value axis. */
  readonly zLabel?: string;
}

/**
 * Every cell as an (x coordinate, y coordinate, value) triple.
 *
 * Ordered y outer and x inner, which is the column-major fill R uses for a
 * `length(x)` by `length(y)` matrix.
 */
export interface FlatTriples {
  readonly x: number[];
  readonly y: number[];
  readonly z: number[];
}

export function flattenTriples(table: LookupTable): FlatTriples {
  const xCoords = table.getXCoords();
  const yCoords = table.getYCoords();
  const triples: FlatTriples = { x: [], y: [], z: [] };

  for (let y = 0; y < table.rows; y++) {
    for (let x = 0; x < table.cols; x++) {
      triples.x.push(xCoords[x]);
      triples.y.push(yCoords[y]);
      triples.z.push(table.get(x, y));
    }
  }
  return triples;
}

function rVector(values: ReadonlyArray<number>): string {
  return `c(${values.join(', ')})`;
}

function rString(value: string): string {
  return JSON.stringify(value);
}

function header(table: LookupTable, format: PlotFormat): string[] {
  return [
    '',
    '#',
    `# Look up table plot (${format}), ${table.cols} x ${table.rows} cells.`,
    '#',
    '# start up R and then load this file by typing:',
    '# source(<this file name>)',
    '#',
    '',
    'library(rgl);',
    '',
  ];
}

function perspScript(table: LookupTable, zLabel: string): string[] {
  const { z } = flattenTriples(table);
  return [
    `x <- ${rVector(table.getXCoords())};`,
    `y <- ${rVector(table.getYCoords())};`,
    `z <- ${rVector(z)};`,
    `dim(z) <- c(${table.cols}, ${table.rows})`,
    '',
    'open3d()',
    'bg3d("white")',
    'material3d("black")',
    '',
    `persp3d(x, y, z, col="lightblue", xlab=${rString(table.xTitle)}, ylab=${rString(table.yTitle)}, zlab=${rString(zLabel)})`,
  ];
}

function fitScript(table: LookupTable, zLabel: string): string[] {
  const { x, y, z } = flattenTriples(table);
  return [
    `x <- ${rVector(x)};`,
    `y <- ${rVector(y)};`,
    `z <- ${rVector(z)};`,
    `# ${table.cols} x coordinates by ${table.rows} y coordinates`,
    '',
    'fit <- lsfit(cbind(x, y), z)',
    'print(fit$coefficients)',
    '',
    'open3d()',
    'bg3d("white")',
    'material3d("black")',
    '',
    `plot3d(x, y, z, col="red", size=5, xlab=${rString(table.xTitle)}, ylab=${rString(table.yTitle)}, zlab=${rString(zLabel)})`,
    'coefs <- fit$coefficients',
    'planes3d(coefs[2], coefs[3], -1, coefs[1], alpha=0.5, col="lightblue")',
  ];
}

/**
 * Render a table as a plotting script.
 *
 * @param table - Table to plot
 * @param format - Script flavour, see {@link PlotFormat}
 * @returns Script text ending with a newline
 * @throws TableError INVALID_ARGUMENT for an unknown format
 */
export function renderPlot(
  table: LookupTable,
  format: PlotFormat,
  options: PlotOptions = {}
): string {
  const zLabel = options.zLabel ?? 'value';

  let body: string[];
  switch (format) {
    case 'R':
      body = perspScript(table, zLabel);
      break;
    case 'R-fit':
      body = fitScript(table, zLabel);
      break;
    default:
      fail('INVALID_ARGUMENT', `Unknown plot format: ${String(format)}`);
  }

  return [...header(table, format), ...body].join('\n') + '\n';
}
