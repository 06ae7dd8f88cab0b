#!/usr/bin/env node
/**
 * lutgrid CLI entry point.
 *
 * Usage:
 *   lutgrid show engine.tbl
 *   lutgrid plot engine.tbl --format R-fit > engine.R
 *   lutgrid nudge engine.tbl 2000 85 2 --range 1
 *
 * Run `lutgrid --help` for every command.
 */

import { run } from './run.js';

process.exitCode = run(process.argv.slice(2));
