/**
 * Settings file for the lutgrid CLI.
 *
 * The file is JSON5, so comments and trailing commas are fine:
 *
 *     // lutgrid.config.json5
 *     {
 *       plotFormat: 'R-fit',
 *       roundDigits: 1,
 *       range: 1,
 *       zLabel: 'ign',
 *     }
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import JSON5 from 'json5';
import { isPlotFormat, type PlotFormat } from '../lib/plot/r-script.js';

export const DEFAULT_CONFIG_FILE = 'lutgrid.config.json5';

export interface CLIConfig {
  /** Script flavour used by `plot` when no --format is given */
  readonly plotFormat: PlotFormat;
  /** Decimal places kept by `plane` when no digits argument is given */
  readonly roundDigits: number;
  /** Neighborhood range used by `lookup` and `nudge` when no --range is given */
  readonly range: number;
  /** Value axis label in plot scripts */
  readonly zLabel: string;
}

export const DEFAULT_CONFIG: CLIConfig = Object.freeze({
  plotFormat: 'R',
  roundDigits: 2,
  range: 0,
  zLabel: 'value',
});

export interface LoadedConfig {
  readonly config: CLIConfig;
  /** Where the settings came from, undefined for the defaults */
  readonly source?: string;
  readonly warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNonNegativeInteger(raw: Record<string, unknown>, key: string, source: string): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${source}: '${key}' must be a non-negative integer`);
  }
  return value;
}

/**
 * Parse and validate settings text, filling unset fields from the defaults.
 *
 * @param text - JSON5 source
 * @param source - Name used in messages, usually the file path
 * @throws Error if the text is not JSON5 or a field has the wrong type
 */
export function parseConfig(text: string, source = DEFAULT_CONFIG_FILE): LoadedConfig {
  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (error) {
    throw new Error(`${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isRecord(raw)) {
    throw new Error(`${source}: settings must be an object`);
  }

  const warnings: string[] = [];
  for (const key of Object.keys(raw)) {
    if (!Object.hasOwn(DEFAULT_CONFIG, key)) {
      warnings.push(`${source}: unknown setting '${key}' ignored`);
    }
  }

  let plotFormat = DEFAULT_CONFIG.plotFormat;
  const rawFormat = raw.plotFormat;
  if (rawFormat !== undefined) {
    if (typeof rawFormat !== 'string' || !isPlotFormat(rawFormat)) {
      throw new Error(`${source}: 'plotFormat' must be one of R, R-fit`);
    }
    plotFormat = rawFormat;
  }

  let zLabel = DEFAULT_CONFIG.zLabel;
  const rawLabel = raw.zLabel;
  if (rawLabel !== undefined) {
    if (typeof rawLabel !== 'string' || rawLabel === '') {
      throw new Error(`${source}: 'zLabel' must be a non-empty string`);
    }
    zLabel = rawLabel;
  }

  const config: CLIConfig = Object.freeze({
    plotFormat,
    roundDigits: readNonNegativeInteger(raw, 'roundDigits', source) ?? DEFAULT_CONFIG.roundDigits,
    range: readNonNegativeInteger(raw, 'range', source) ?? DEFAULT_CONFIG.range,
    zLabel,
  });

  return { config, source, warnings };
}

/**
 * Load settings from `explicitPath`, or from lutgrid.config.json5 in `cwd`
 * when it exists. Without either the defaults are used.
 *
 * @throws Error if an explicit path is missing or a file is invalid
 */
export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): LoadedConfig {
  if (explicitPath !== undefined) {
    const path = resolve(cwd, explicitPath);
    if (!existsSync(path)) {
      throw new Error(`Config file not found: ${explicitPath}`);
    }
    return parseConfig(readFileSync(path, 'utf8'), explicitPath);
  }

  const defaultPath = resolve(cwd, DEFAULT_CONFIG_FILE);
  if (!existsSync(defaultPath)) {
    return { config: DEFAULT_CONFIG, warnings: [] };
  }
  return parseConfig(readFileSync(defaultPath, 'utf8'), DEFAULT_CONFIG_FILE);
}
