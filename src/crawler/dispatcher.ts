import PQueue from 'p-queue';
import type { ScheduleEntry } from '../types.js';
import type { UrlStore } from '../frontier/store.js';
import { FrontierError } from '../frontier/errors.js';

/**
 * Fetches one URL. Resolves with the links found on the page, if any.
 */
export type VisitFn = (url: string) => Promise<string[] | void>;

/**
 * Configuration for the FrontierDispatcher.
 */
export interface DispatcherConfig {
  /** Maximum number of visits running at once. */
  concurrency: number;
  /** URLs planned per scheduling round. */
  maxUrls: number;
  /** Lookahead in seconds for each scheduling round. */
  timeLimit: number;
  /** Stop after this many rounds. Unlimited when omitted. */
  maxRounds?: number;

  // Events
  onVisited?: (url: string, links: number) => void;
  onError?: (url: string, error: Error) => void;
}

/**
 * Result of a dispatcher run.
 */
export interface DispatchResult {
  visited: string[];
  failed: string[];
  rounds: number;
}

/**
 * Crawl loop over a UrlStore.
 *
 * Each round asks the store for a download schedule, starts every planned
 * visit once its wait has elapsed, and runs visits through a p-queue that
 * caps concurrency. Links returned by a visit go back into the store. The
 * run ends when no domain has unvisited URLs left or `maxRounds` is reached.
 * A failing visit is reported through `onError` and does not stop the run.
 */
export class FrontierDispatcher {
  private readonly queue: PQueue;

  constructor(
    private readonly store: UrlStore,
    private readonly visit: VisitFn,
    private readonly config: DispatcherConfig,
  ) {
    // An empty plan per round would never let the run finish.
    if (!Number.isInteger(config.maxUrls) || config.maxUrls < 1) {
      throw new FrontierError(`maxUrls must be a positive integer, got ${config.maxUrls}`);
    }
    this.queue = new PQueue({ concurrency: config.concurrency });
  }

  async run(): Promise<DispatchResult> {
    const result: DispatchResult = { visited: [], failed: [], rounds: 0 };

    while (!this.store.isDone()) {
      if (this.config.maxRounds !== undefined && result.rounds >= this.config.maxRounds) {
        break;
      }

      const plan = this.store.establishDownloadSchedule(this.config.maxUrls, this.config.timeLimit);
      if (plan.length === 0) {
        // Every open domain is further away than the lookahead.
        const next = this.store.getDownloadableDomains(Number.POSITIVE_INFINITY)[0];
        if (!next) {
          break;
        }
        await this.sleep(next.waitSeconds * 1000);
        continue;
      }

      result.rounds++;
      const start = Date.now();
      await Promise.all(plan.map((entry) => this.dispatchAt(entry, start, result)));
    }

    await this.queue.onIdle();
    return result;
  }

  /**
   * Wait until an entry's planned start, then run its visit through the queue.
   */
  private async dispatchAt(entry: ScheduleEntry, start: number, result: DispatchResult): Promise<void> {
    const delay = start + entry.waitSeconds * 1000 - Date.now();
    if (delay > 0) {
      await this.sleep(delay);
    }
    await this.queue.add(() => this.runVisit(entry.url, result));
  }

  private async runVisit(url: string, result: DispatchResult): Promise<void> {
    try {
      const found = await this.visit(url);
      const links = Array.isArray(found) ? found : [];
      if (links.length > 0) {
        this.store.addUrls(links);
      }
      result.visited.push(url);
      this.config.onVisited?.(url, links.length);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      result.failed.push(url);
      this.config.onError?.(url, err);
    }
  }

  /**
   * Sleep for a given number of milliseconds.
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
