import { readFileSync } from 'node:fs';
import type { FrontierConfig } from '../types.js';

/**
 * Raw CLI options as parsed by commander.
 */
export interface CLIOptions {
  visited?: string;
  strict?: boolean;
  language?: string;
  compress?: boolean;
  delay?: string;
  sample?: string;
  excludeMin?: string;
  excludeMax?: string;
  schedule?: string;
  timeLimit?: string;
  unvisited?: boolean;
  withStatus?: boolean;
  output?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * What the CLI does with the URL list once it is loaded.
 */
export type CLIAction =
  | { kind: 'sample'; size: number; excludeMin?: number; excludeMax?: number }
  | { kind: 'schedule'; maxUrls: number; timeLimit: number }
  | { kind: 'dump'; unvisitedOnly: boolean; withStatus: boolean };

/** Default scheduling lookahead in seconds. */
export const DEFAULT_TIME_LIMIT = 10;

/**
 * Parse a non-negative integer option value.
 *
 * @throws Error naming the option when the value is not a non-negative integer
 */
export function parseCount(value: string, option: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid value for ${option}: "${value}". Expected a non-negative integer.`);
  }
  return parsed;
}

/**
 * Parse a non-negative number of seconds.
 *
 * @throws Error naming the option when the value is not a non-negative number
 */
export function parseSeconds(value: string, option: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid value for ${option}: "${value}". Expected a non-negative number.`);
  }
  return parsed;
}

/**
 * Read a URL list: one URL per line, blank lines and `#` comments skipped.
 *
 * @param filePath - Path to the file, or "-" for standard input
 * @throws Error if the file cannot be read
 */
export function readUrlList(filePath: string): string[] {
  let content: string;
  try {
    content = readFileSync(filePath === '-' ? 0 : filePath, 'utf-8');
  } catch (error) {
    throw new Error(
      `Cannot read URL list "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Build the frontier config from the parsed CLI options.
 * Only sets properties that were explicitly provided.
 */
export function buildConfig(options: CLIOptions): Partial<FrontierConfig> {
  const config: Partial<FrontierConfig> = {};

  if (options.strict) {
    config.strict = true;
  }
  if (options.language !== undefined) {
    config.language = options.language;
  }
  if (options.compress) {
    config.compressed = true;
  }
  if (options.delay !== undefined) {
    config.defaultCrawlDelay = parseSeconds(options.delay, '--delay');
  }
  if (options.verbose) {
    config.verbose = true;
  }

  return config;
}

/**
 * Decide what to do with the loaded URLs.
 *
 * @throws Error if sampling and scheduling are both requested
 */
export function resolveAction(options: CLIOptions): CLIAction {
  if (options.sample !== undefined && options.schedule !== undefined) {
    throw new Error('Cannot use --sample and --schedule at the same time.');
  }

  if (options.sample !== undefined) {
    const action: CLIAction = { kind: 'sample', size: parseCount(options.sample, '--sample') };
    if (options.excludeMin !== undefined) {
      action.excludeMin = parseCount(options.excludeMin, '--exclude-min');
    }
    if (options.excludeMax !== undefined) {
      action.excludeMax = parseCount(options.excludeMax, '--exclude-max');
    }
    return action;
  }

  if (options.schedule !== undefined) {
    return {
      kind: 'schedule',
      maxUrls: parseCount(options.schedule, '--schedule'),
      timeLimit:
        options.timeLimit !== undefined
          ? parseSeconds(options.timeLimit, '--time-limit')
          : DEFAULT_TIME_LIMIT,
    };
  }

  return {
    kind: 'dump',
    unvisitedOnly: options.unvisited ?? false,
    withStatus: options.withStatus ?? false,
  };
}
