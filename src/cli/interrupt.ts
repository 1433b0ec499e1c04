import type { UrlStore, LineSink } from '../frontier/store.js';

/** Signal numbers for the exit code (128 + n). */
const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGTERM: 15,
};

/**
 * Anything signals can be subscribed on; `process` in production.
 */
export interface SignalSource {
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Options for installSnapshotDump.
 */
export interface SnapshotDumpOptions {
  signals?: NodeJS.Signals[];
  /** Where the snapshot JSON goes. Defaults to stderr. */
  out?: LineSink;
  source?: SignalSource;
  exit?: (code: number) => void;
}

/**
 * On the first of the given signals, write the store's snapshot as one JSON
 * line and exit with 128 + the signal number.
 *
 * @returns A function removing the handlers again
 */
export function installSnapshotDump(store: UrlStore, options: SnapshotDumpOptions = {}): () => void {
  const signals = options.signals ?? ['SIGINT', 'SIGTERM'];
  const out = options.out ?? process.stderr;
  const source: SignalSource = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  const handler = (signal: NodeJS.Signals): void => {
    remove();
    out.write(JSON.stringify(store.snapshot()) + '\n');
    exit(128 + (SIGNAL_NUMBERS[signal] ?? 0));
  };

  function remove(): void {
    for (const signal of signals) {
      source.off(signal, handler);
    }
  }

  for (const signal of signals) {
    source.once(signal, handler);
  }
  return remove;
}
