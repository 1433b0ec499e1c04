import type { ScheduleEntry } from '../types.js';

/**
 * Output verbosity level for the CLI.
 */
export type Verbosity = 'normal' | 'verbose' | 'quiet';

/**
 * Counters gathered while the CLI runs.
 */
export interface RunStats {
  input: number;
  output: number;
  domains: number;
  discardedUrls: number;
  discardedDomains: number;
}

/**
 * Create event callback handlers that report progress on stderr, so that
 * stdout stays free for the URL output.
 *
 * - quiet mode: no output, counting only
 * - normal mode: counting only
 * - verbose mode: one line per discarded URL or domain
 */
export function createProgressCallbacks(verbosity: Verbosity): {
  onUrlDiscarded: (url: string, reason: string) => void;
  onDomainDiscarded: (domain: string, size: number) => void;
  counts: () => { discardedUrls: number; discardedDomains: number };
} {
  let discardedUrls = 0;
  let discardedDomains = 0;

  return {
    onUrlDiscarded: (url: string, reason: string) => {
      discardedUrls++;
      if (verbosity === 'verbose') {
        process.stderr.write(`  Discarded: ${url} (${reason})\n`);
      }
    },

    onDomainDiscarded: (domain: string, size: number) => {
      discardedDomains++;
      if (verbosity === 'verbose') {
        process.stderr.write(`  Discarded domain: ${domain} (${size} urls)\n`);
      }
    },

    counts: () => ({ discardedUrls, discardedDomains }),
  };
}

/**
 * Format a download schedule as `waitSeconds<TAB>url` lines.
 */
export function formatSchedule(plan: readonly ScheduleEntry[]): string[] {
  return plan.map((entry) => `${entry.waitSeconds.toFixed(2)}\t${entry.url}`);
}

/**
 * Print a summary of the run to stderr.
 */
export function printSummary(stats: RunStats, verbosity: Verbosity): void {
  if (verbosity === 'quiet') {
    return;
  }

  process.stderr.write(`Done! ${stats.output} of ${stats.input} URLs`);
  if (stats.domains > 0) {
    process.stderr.write(` across ${stats.domains} domains`);
  }
  process.stderr.write('\n');

  if (stats.discardedUrls > 0) {
    process.stderr.write(`Discarded URLs: ${stats.discardedUrls}\n`);
  }
  if (stats.discardedDomains > 0) {
    process.stderr.write(`Discarded domains: ${stats.discardedDomains}\n`);
  }
}
