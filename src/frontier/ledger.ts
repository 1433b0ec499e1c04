import type { UrlEntry } from '../types.js';

/**
 * Result of inserting a path into a ledger.
 */
export type AddResult = 'added' | 'updated' | 'unchanged';

/**
 * Options for UrlLedger construction.
 */
export interface LedgerOptions {
  /** Treat "/a" and "/a/" as the same entry. */
  trailingSlash: boolean;
}

/**
 * Return the trailing-slash twin of a path ("/a" <-> "/a/"), or undefined for the root.
 */
export function trailingSlashVariant(path: string): string | undefined {
  if (path === '/' || path === '') {
    return undefined;
  }
  return path.endsWith('/') ? path.slice(0, -1) : path + '/';
}

/**
 * Ordered collection of the URL entries of a single domain.
 *
 * Entries live in one logical sequence: the prepended block (kept as a stack
 * whose last element is the head of the sequence) followed by the appended
 * block in FIFO order. The unvisited queue is that sequence filtered on the
 * visited marker; a Map index gives O(1) membership.
 */
export class UrlLedger {
  private head: UrlEntry[] = [];
  /** Prepended entries not yet popped, same order as `head`. */
  private headPending: UrlEntry[] = [];
  private tail: UrlEntry[] = [];
  private index = new Map<string, UrlEntry>();
  /** Every tail entry before this position is visited. */
  private tailCursor = 0;
  private unvisited = 0;

  constructor(private readonly options: LedgerOptions) {}

  /**
   * Rebuild a ledger from entries in sequence order.
   */
  static fromEntries(entries: Iterable<UrlEntry>, options: LedgerOptions): UrlLedger {
    const ledger = new UrlLedger(options);
    for (const entry of entries) {
      if (ledger.lookup(entry.path)) {
        continue;
      }
      const copy: UrlEntry = { path: entry.path, visited: entry.visited };
      if (entry.visitedAt !== undefined) {
        copy.visitedAt = entry.visitedAt;
      }
      ledger.insert(copy, false);
    }
    return ledger;
  }

  /**
   * Insert a path, or flip an existing entry to visited.
   *
   * @param path - Path relative to the domain
   * @param visited - Whether the URL is already visited
   * @param prepend - Place the entry at the head of the queue instead of the tail
   * @param timestamp - Visit time recorded when `visited` is set
   */
  addUrl(path: string, visited = false, prepend = false, timestamp?: number): AddResult {
    const existing = this.lookup(path);
    if (existing) {
      if (visited && !existing.visited) {
        this.visit(existing, timestamp);
        return 'updated';
      }
      return 'unchanged';
    }

    const entry: UrlEntry = { path, visited: false };
    this.insert(entry, prepend);
    if (visited) {
      this.visit(entry, timestamp);
    }
    return 'added';
  }

  /**
   * Insert a batch of paths. With `prepend`, the batch lands at the head of
   * the queue in its own order.
   *
   * @returns Number of entries created or flipped to visited
   */
  addMany(
    paths: readonly string[],
    options: { visited?: boolean; prepend?: boolean; timestamp?: number } = {},
  ): number {
    const visited = options.visited ?? false;
    const prepend = options.prepend ?? false;
    let changed = 0;

    if (prepend) {
      for (let i = paths.length - 1; i >= 0; i--) {
        if (this.addUrl(paths[i], visited, true, options.timestamp) !== 'unchanged') {
          changed++;
        }
      }
    } else {
      for (const path of paths) {
        if (this.addUrl(path, visited, false, options.timestamp) !== 'unchanged') {
          changed++;
        }
      }
    }
    return changed;
  }

  /**
   * Mark a known path as visited.
   *
   * @returns false when the path is unknown
   */
  markVisited(path: string, timestamp: number): boolean {
    const entry = this.lookup(path);
    if (!entry) {
      return false;
    }
    if (!entry.visited) {
      this.visit(entry, timestamp);
    }
    return true;
  }

  isKnown(path: string): boolean {
    return this.lookup(path) !== undefined;
  }

  hasBeenVisited(path: string): boolean {
    return this.lookup(path)?.visited ?? false;
  }

  /**
   * Remove the head of the unvisited queue by marking it visited.
   *
   * @returns The path, or undefined when nothing is left
   */
  popNext(timestamp: number): string | undefined {
    for (let entry = this.headPending.pop(); entry; entry = this.headPending.pop()) {
      if (!entry.visited) {
        this.visit(entry, timestamp);
        return entry.path;
      }
    }

    while (this.tailCursor < this.tail.length) {
      const entry = this.tail[this.tailCursor];
      this.tailCursor++;
      if (!entry.visited) {
        this.visit(entry, timestamp);
        return entry.path;
      }
    }
    return undefined;
  }

  /** All known paths in queue order. */
  findKnown(): string[] {
    return this.entries().map((entry) => entry.path);
  }

  /** Unvisited paths in queue order. */
  findUnvisited(): string[] {
    if (this.unvisited === 0) {
      return [];
    }
    return this.entries()
      .filter((entry) => !entry.visited)
      .map((entry) => entry.path);
  }

  isExhausted(): boolean {
    return this.unvisited === 0;
  }

  get size(): number {
    return this.index.size;
  }

  get unvisitedCount(): number {
    return this.unvisited;
  }

  /**
   * Entries in queue order. The returned objects are the live entries; callers
   * copy them before handing them out.
   */
  entries(): UrlEntry[] {
    const ordered: UrlEntry[] = [];
    for (let i = this.head.length - 1; i >= 0; i--) {
      ordered.push(this.head[i]);
    }
    for (const entry of this.tail) {
      ordered.push(entry);
    }
    return ordered;
  }

  toJSON(): UrlEntry[] {
    return this.entries().map((entry) =>
      entry.visitedAt === undefined
        ? { path: entry.path, visited: entry.visited }
        : { path: entry.path, visited: entry.visited, visitedAt: entry.visitedAt },
    );
  }

  private lookup(path: string): UrlEntry | undefined {
    const exact = this.index.get(path);
    if (exact || !this.options.trailingSlash) {
      return exact;
    }
    const variant = trailingSlashVariant(path);
    return variant === undefined ? undefined : this.index.get(variant);
  }

  private insert(entry: UrlEntry, prepend: boolean): void {
    if (prepend) {
      this.head.push(entry);
      this.headPending.push(entry);
    } else {
      this.tail.push(entry);
    }
    this.index.set(entry.path, entry);
    if (!entry.visited) {
      this.unvisited++;
    }
  }

  private visit(entry: UrlEntry, timestamp?: number): void {
    entry.visited = true;
    if (timestamp !== undefined) {
      entry.visitedAt = timestamp;
    }
    this.unvisited--;
  }
}
