/**
 * Lifecycle state of a domain in the frontier.
 *
 * - `open`: at least one known URL has not been visited yet
 * - `exhausted`: every known URL has been visited
 * - `discarded`: explicitly dropped; further inserts are ignored
 */
export type DomainStatus = 'open' | 'exhausted' | 'discarded';

/**
 * Where a domain's crawl delay came from.
 */
export type DelaySource = 'default' | 'rules' | 'explicit';

/**
 * A single URL known to the frontier, relative to its domain.
 */
export interface UrlEntry {
  /** Path, query and fragment without the domain prefix ("/" for the root). */
  path: string;
  visited: boolean;
  /** Epoch milliseconds of the visit, absent until visited. */
  visitedAt?: number;
}

/**
 * Read-only view of a domain's bookkeeping.
 */
export interface DomainState {
  domain: string;
  status: DomainStatus;
  /** Crawl delay in seconds. */
  crawlDelay: number;
  delaySource: DelaySource;
  /** Epoch ms of the last actual or planned fetch. */
  lastAccess?: number;
  /** Epoch ms at which the domain last became open. */
  openedAt: number;
  /** Number of known URLs. */
  total: number;
  /** Number of visited URLs, including those added as visited. */
  count: number;
  hasRules: boolean;
}

/**
 * One planned fetch in a download schedule.
 */
export interface ScheduleEntry {
  domain: string;
  path: string;
  url: string;
  /** Seconds from now until the fetch may start. */
  waitSeconds: number;
}

/**
 * A domain that may be fetched within the requested lookahead.
 */
export interface DownloadableDomain {
  domain: string;
  waitSeconds: number;
}

/**
 * Options shared by the canonicalization collaborators and the store.
 */
export interface CanonicalizeOptions {
  /** Keep only a known set of query parameters and reject non-crawlable pages. */
  strict?: boolean;
  /** Target language tag; URLs carrying another language are rejected. */
  language?: string;
  /** Host names to reject, matched against the registrable name or domain. */
  blocklist?: readonly string[];
}

/**
 * Full configuration of a UrlStore.
 */
export interface FrontierConfig {
  /** Hold ledgers and rules as compressed buffers. */
  compressed: boolean;
  /** Recorded and handed to canonicalization; not enforced by the store itself. */
  language?: string;
  strict: boolean;
  /** Treat "/a" and "/a/" as the same entry. */
  trailingSlash: boolean;
  /** Hosts rejected on insert, e.g. DEFAULT_BLOCKLIST. Nothing is blocked when omitted. */
  blocklist?: readonly string[];
  /** Dump a snapshot when the host process is interrupted (wired by the CLI). */
  verbose: boolean;
  /** Crawl delay in seconds for domains without rules or an explicit delay. */
  defaultCrawlDelay: number;
  /** User agent used when reading a crawl delay from stored rules. */
  userAgent: string;

  // Events
  onUrlDiscarded?: (url: string, reason: string) => void;
  onUnknownUrl?: (url: string) => void;
}

/**
 * Default configuration values. Applied when merging a user-provided
 * partial config into a full FrontierConfig.
 */
export const CONFIG_DEFAULTS = {
  compressed: false,
  strict: false,
  trailingSlash: true,
  verbose: false,
  defaultCrawlDelay: 5,
  userAgent: 'frontier-store/1.0',
} as const satisfies Partial<FrontierConfig>;
