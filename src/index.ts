/**
 * lutgrid - two-dimensional look up tables stored as hand editable text.
 *
 * @example
 * ```typescript
 * import { loadTableFile, saveTableFile, adjustPoints } from 'lutgrid';
 *
 * const table = loadTableFile('ignition.tbl');
 *
 * // Advance every cell around 2000 rpm / 85 kPa by 2 degrees
 * adjustPoints(table, table.lookupPoints(2000, 85, 1), 2);
 *
 * saveTableFile(table);
 * ```
 */

export { LookupTable, buildTable, copyTable } from './lib/core/types.js';
export type { TableParts, Axis } from './lib/core/types.js';
export { CellOffset } from './lib/core/offset.js';
export {
  TableError,
  isTableFailure,
  tableFailure,
  describeFailure,
} from './lib/core/failure.js';
export type { TableFailure, TableFailureReason } from './lib/core/failure.js';
export { parseTable, tryParseTable, exportTable, tokenize } from './lib/parser/parser.js';
export { diffValues, diffCoords } from './lib/query/diff.js';
export { lookupPoints, nearestOffset } from './lib/query/lookup.js';
export { adjustPoints } from './lib/operations/adjust.js';
export { fillPlane, truncateDigits } from './lib/operations/plane.js';
export type { PlaneConstants } from './lib/operations/plane.js';
export { renderPlot, flattenTriples, isPlotFormat, PLOT_FORMATS } from './lib/plot/r-script.js';
export type { PlotFormat, PlotOptions, FlatTriples } from './lib/plot/r-script.js';
export { loadTableFile, saveTableFile, tryLoadTableFile } from './lib/io/table-file.js';
