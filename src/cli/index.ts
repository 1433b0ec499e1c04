import { writeFileSync } from 'node:fs';
import { setImmediate as nextTurn } from 'node:timers/promises';
import { Command } from 'commander';
import { createFrontier } from '../sdk/index.js';
import { sampleUrls } from '../sampling/index.js';
import { CONFIG_DEFAULTS } from '../types.js';
import type { AddUrlsOptions, UrlStore } from '../frontier/store.js';
import {
  buildConfig,
  readUrlList,
  resolveAction,
  DEFAULT_TIME_LIMIT,
  type CLIAction,
  type CLIOptions,
} from './options.js';
import {
  createProgressCallbacks,
  formatSchedule,
  printSummary,
  type Verbosity,
} from './progress.js';
import { installSnapshotDump } from './interrupt.js';

/**
 * Create and configure the commander program with all CLI options.
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('frontier-store')
    .description('Canonicalize, filter, sample and schedule URL lists by domain')
    .version('0.1.0')
    .argument('<input>', 'File with one URL per line ("-" for stdin)')

    // Store
    .option('--visited <file>', 'File with URLs already visited')
    .option('--strict', 'Strict canonicalization (fewer query parameters, no login/feed pages)')
    .option('--language <tag>', 'Only keep URLs compatible with this language')
    .option('--compress', 'Hold URLs compressed in memory')
    .option('--delay <seconds>', 'Default crawl delay', String(CONFIG_DEFAULTS.defaultCrawlDelay))

    // Sampling
    .option('--sample <n>', 'Sample at most n URLs per domain')
    .option('--exclude-min <n>', 'Skip domains with fewer URLs when sampling')
    .option('--exclude-max <n>', 'Skip domains with more URLs when sampling')

    // Scheduling
    .option('--schedule <n>', 'Print a download schedule of up to n URLs')
    .option('--time-limit <seconds>', 'Scheduling lookahead', String(DEFAULT_TIME_LIMIT))

    // Output
    .option('--unvisited', 'Only output unvisited URLs')
    .option('--with-status', 'Append the visited flag to each URL')
    .option('-o, --output <file>', 'Write to a file instead of stdout')

    // General
    .option('-v, --verbose', 'Verbose logging; dump state as JSON on interrupt')
    .option('-q, --quiet', 'Suppress output except errors');

  return program;
}

/**
 * Determine the verbosity level from CLI flags.
 */
function getVerbosity(options: CLIOptions): Verbosity {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

/**
 * Validate flag combinations commander cannot express.
 *
 * @throws Error if validation fails
 */
function validateCLIOptions(options: CLIOptions): void {
  if (options.verbose && options.quiet) {
    throw new Error('Cannot use --verbose and --quiet at the same time.');
  }
  if (options.sample === undefined && (options.excludeMin !== undefined || options.excludeMax !== undefined)) {
    throw new Error('--exclude-min and --exclude-max require --sample.');
  }
}

/**
 * Output lines of a store for a dump action.
 */
function dumpLines(store: UrlStore, action: Extract<CLIAction, { kind: 'dump' }>): string[] {
  if (action.withStatus && action.unvisitedOnly) {
    return store.dumpUnvisitedUrls().map((url) => `${url}\tfalse`);
  }
  if (action.withStatus) {
    const chunks: string[] = [];
    store.printUrls({ write: (chunk: string) => chunks.push(chunk) });
    return chunks.join('').split('\n').filter((line) => line !== '');
  }
  return action.unvisitedOnly ? store.dumpUnvisitedUrls() : store.dumpUrls();
}

type ProgressCallbacks = ReturnType<typeof createProgressCallbacks>;

interface ActionOutput {
  lines: string[];
  domains: number;
}

/**
 * Sample the URL list by domain.
 */
function runSample(
  urls: readonly string[],
  action: Extract<CLIAction, { kind: 'sample' }>,
  options: CLIOptions,
  callbacks: ProgressCallbacks,
): ActionOutput {
  const lines = sampleUrls(urls, action.size, {
    excludeMin: action.excludeMin,
    excludeMax: action.excludeMax,
    strict: options.strict ?? false,
    onDomainDiscarded: callbacks.onDomainDiscarded,
  });
  return { lines, domains: new Set(lines.map((url) => new URL(url).origin)).size };
}

/** URLs added per event-loop turn while loading a list. */
const ADD_CHUNK_SIZE = 1000;

/**
 * Add a URL list in chunks, giving signal handlers a turn after each chunk.
 */
async function addInChunks(
  store: UrlStore,
  urls: readonly string[],
  options: AddUrlsOptions = {},
): Promise<void> {
  for (let start = 0; start < urls.length; start += ADD_CHUNK_SIZE) {
    store.addUrls(urls.slice(start, start + ADD_CHUNK_SIZE), options);
    await nextTurn();
  }
}

/**
 * Load the URL list (and the visited list) into a frontier, then schedule or dump.
 * In verbose mode an interrupt while loading dumps the frontier's snapshot to stderr.
 */
async function runStore(
  urls: readonly string[],
  action: Exclude<CLIAction, { kind: 'sample' }>,
  options: CLIOptions,
  callbacks: ProgressCallbacks,
): Promise<ActionOutput> {
  const store = createFrontier({
    ...buildConfig(options),
    onUrlDiscarded: callbacks.onUrlDiscarded,
  });
  const removeDump = store.config.verbose ? installSnapshotDump(store) : undefined;
  try {
    await addInChunks(store, urls);
    if (options.visited !== undefined) {
      await addInChunks(store, readUrlList(options.visited), { visited: true });
    }
    const lines =
      action.kind === 'schedule'
        ? formatSchedule(store.establishDownloadSchedule(action.maxUrls, action.timeLimit))
        : dumpLines(store, action);
    return { lines, domains: store.getKnownDomains().length };
  } finally {
    removeDump?.();
  }
}

/**
 * Write output lines to a file, or to stdout.
 */
function writeLines(lines: readonly string[], outputPath?: string): void {
  const text = lines.length > 0 ? lines.join('\n') + '\n' : '';
  if (outputPath) {
    writeFileSync(outputPath, text, 'utf-8');
  } else {
    process.stdout.write(text);
  }
}

/**
 * Main CLI entry point. Reads the URL list, runs the requested action on a
 * frontier (or the sampler) and writes the resulting lines.
 *
 * @param argv - The process.argv array to parse
 */
export async function run(argv: string[]): Promise<void> {
  const program = createProgram();

  program.action(async (input: string, options: CLIOptions) => {
    try {
      validateCLIOptions(options);

      const verbosity = getVerbosity(options);
      const callbacks = createProgressCallbacks(verbosity);
      const action = resolveAction(options);
      const urls = readUrlList(input);

      const { lines, domains } =
        action.kind === 'sample'
          ? runSample(urls, action, options, callbacks)
          : await runStore(urls, action, options, callbacks);

      writeLines(lines, options.output);
      printSummary(
        { input: urls.length, output: lines.length, domains, ...callbacks.counts() },
        verbosity,
      );
    } catch (error) {
      process.stderr.write(
        `Error: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      process.exitCode = 1;
    }
  });

  await program.parseAsync(argv);
}
