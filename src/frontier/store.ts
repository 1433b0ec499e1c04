import type {
  CanonicalizeOptions,
  DomainState,
  DownloadableDomain,
  FrontierConfig,
  ScheduleEntry,
} from '../types.js';
import { canonicalize, type CanonicalUrl } from '../urls/canonicalize.js';
import { UrlParseCache } from '../urls/cache.js';
import { extractLinks } from '../urls/link-extractor.js';
import { validateAndMergeConfig } from './config.js';
import type { DomainRecord } from './domain.js';
import { assertDomainKey, FrontierError, SnapshotError } from './errors.js';
import { UrlLedger } from './ledger.js';
import { DomainRegistry } from './registry.js';
import { crawlDelayFromRules, parseRules, type Robot } from './rules.js';
import { Scheduler } from './scheduler.js';
import { snapshotSchema, type FrontierSnapshot } from './schema.js';
import { getStorage, type StorageStrategy } from './storage/index.js';

/**
 * Options for UrlStore.addUrls.
 */
export interface AddUrlsOptions {
  /** Put the URLs at the head of their domain's queue. */
  prepend?: boolean;
  /** Record the URLs as already visited. */
  visited?: boolean;
}

/**
 * Options for UrlStore.addFromHtml.
 */
export interface AddFromHtmlOptions {
  /** Keep links to other hosts. */
  external?: boolean;
  prepend?: boolean;
}

/**
 * Minimal output sink for the print operations.
 */
export interface LineSink {
  write(chunk: string): unknown;
}

/**
 * The crawl frontier: known and visited URLs per domain, crawl delays, rules
 * and download scheduling.
 *
 * Every operation is synchronous and in-memory, so each call runs to
 * completion before another one starts. Concurrent async workers sharing a
 * store therefore never receive the same URL from getUrl, and overlapping
 * addUrls calls never create duplicate entries.
 */
export class UrlStore {
  readonly config: FrontierConfig;
  private readonly storage: StorageStrategy;
  private readonly registry: DomainRegistry;
  private readonly scheduler: Scheduler;
  private readonly cache: UrlParseCache;

  /**
   * @param userConfig - Partial configuration, merged over CONFIG_DEFAULTS
   * @param cache - Canonicalization cache; the store creates its own when omitted
   */
  constructor(userConfig: Partial<FrontierConfig> = {}, cache?: UrlParseCache) {
    this.config = validateAndMergeConfig(userConfig);
    const ledgerOptions = { trailingSlash: this.config.trailingSlash };
    this.storage = getStorage(this.config.compressed, ledgerOptions);
    this.registry = new DomainRegistry({
      defaultCrawlDelay: this.config.defaultCrawlDelay,
      storage: this.storage,
      ledger: ledgerOptions,
    });
    this.scheduler = new Scheduler(this.registry);
    this.cache = cache ?? new UrlParseCache();
  }

  // ---------------------------------------------------------------------------
  // Additions and removals
  // ---------------------------------------------------------------------------

  /**
   * Canonicalize and insert URLs. Rejected URLs are reported through
   * `onUrlDiscarded` and skipped; duplicates are ignored.
   *
   * @returns Number of entries created or flipped to visited
   */
  addUrls(urls: Iterable<string>, options: AddUrlsOptions = {}): number {
    const byDomain = new Map<string, string[]>();
    const seen = new Set<string>();

    for (const raw of urls) {
      if (seen.has(raw)) {
        continue;
      }
      seen.add(raw);

      const result = canonicalize(raw, this.canonicalizeOptions(), this.cache);
      if (!result.ok) {
        this.config.onUrlDiscarded?.(raw, result.reason);
        continue;
      }
      const { domain, path } = result.value;
      const paths = byDomain.get(domain);
      if (paths) {
        paths.push(path);
      } else {
        byDomain.set(domain, [path]);
      }
    }

    const now = Date.now();
    let changed = 0;
    for (const [domain, paths] of byDomain) {
      const record = this.registry.ensureDomain(this.registry.resolveKey(domain), now);
      if (record.status === 'discarded') {
        for (const path of paths) {
          this.config.onUrlDiscarded?.(domain + path, 'domain discarded');
        }
        continue;
      }
      const domainChanged = this.registry.updateLedger(
        record,
        (ledger) =>
          ledger.addMany(paths, {
            visited: options.visited,
            prepend: options.prepend,
            timestamp: options.visited ? now : undefined,
          }),
        now,
      );
      // With `visited`, every change is a URL that became visited.
      if (options.visited) {
        record.count += domainChanged;
      }
      changed += domainChanged;
    }
    return changed;
  }

  /**
   * Extract the links of an HTML page and add them.
   *
   * @returns Number of entries created
   */
  addFromHtml(html: string, pageUrl: string, options: AddFromHtmlOptions = {}): number {
    const links = extractLinks(html, pageUrl, { external: options.external });
    return this.addUrls(
      links.map((link) => link.url),
      { prepend: options.prepend },
    );
  }

  /**
   * Record a visit of a known URL, e.g. one fetched outside getUrl.
   * Unknown URLs are reported through `onUnknownUrl`.
   *
   * @returns false when the URL is unknown
   */
  markVisited(url: string, timestamp: number = Date.now()): boolean {
    const parsed = this.parse(url);
    const record = parsed ? this.registry.get(parsed.domain) : undefined;
    if (!parsed || !record) {
      this.config.onUnknownUrl?.(url);
      return false;
    }

    const outcome = this.registry.updateLedger(record, (ledger) => {
      if (!ledger.isKnown(parsed.path)) {
        return 'unknown';
      }
      if (ledger.hasBeenVisited(parsed.path)) {
        return 'already';
      }
      ledger.markVisited(parsed.path, timestamp);
      return 'visited';
    });

    if (outcome === 'unknown') {
      this.config.onUnknownUrl?.(url);
      return false;
    }
    if (outcome === 'visited') {
      record.count++;
      if (record.lastAccess === undefined || timestamp > record.lastAccess) {
        record.lastAccess = timestamp;
      }
    }
    return true;
  }

  /**
   * Drop the URLs of the given domains and ignore any later insert for them.
   * Unknown domains are skipped.
   */
  discard(domains: Iterable<string>): void {
    const keys = Array.from(domains);
    keys.forEach(assertDomainKey);
    for (const domain of keys) {
      const record = this.registry.get(domain);
      if (record) {
        record.status = 'discarded';
        this.registry.emptyLedger(record);
      }
    }
  }

  /**
   * Discard every domain and URL; configuration is kept.
   */
  reset(): void {
    this.registry.clear();
    this.cache.clear();
  }

  // ---------------------------------------------------------------------------
  // Domains
  // ---------------------------------------------------------------------------

  getKnownDomains(): string[] {
    return Array.from(this.registry.allDomains());
  }

  /** Domains with at least one unvisited URL. */
  getUnvisitedDomains(): string[] {
    const domains: string[] = [];
    for (const record of this.registry.values()) {
      if (record.status === 'open') {
        domains.push(record.domain);
      }
    }
    return domains;
  }

  getDomainState(domain: string): DomainState | undefined {
    assertDomainKey(domain);
    return this.registry.getDomainState(domain);
  }

  /**
   * Whether a domain has no unvisited URL left. Unknown and discarded
   * domains count as exhausted.
   */
  isExhaustedDomain(domain: string): boolean {
    assertDomainKey(domain);
    return this.registry.get(domain)?.status !== 'open';
  }

  unvisitedWebsiteCount(): number {
    return this.scheduler.remainingUnvisitedDomainCount();
  }

  /** Whether no domain has an unvisited URL left. */
  isDone(): boolean {
    return this.unvisitedWebsiteCount() === 0;
  }

  // ---------------------------------------------------------------------------
  // URL queries
  // ---------------------------------------------------------------------------

  isKnown(url: string): boolean {
    const parsed = this.parse(url);
    const record = parsed ? this.registry.get(parsed.domain) : undefined;
    if (!parsed || !record) {
      return false;
    }
    return this.registry.readLedger(record, (ledger) => ledger.isKnown(parsed.path));
  }

  hasBeenVisited(url: string): boolean {
    const parsed = this.parse(url);
    const record = parsed ? this.registry.get(parsed.domain) : undefined;
    if (!parsed || !record) {
      return false;
    }
    return this.registry.readLedger(record, (ledger) => ledger.hasBeenVisited(parsed.path));
  }

  /**
   * The URLs of `urls` the store does not know, in input order.
   */
  filterUnknownUrls(urls: readonly string[]): string[] {
    const lookup = this.ledgerLookup();
    return urls.filter((url) => {
      const parsed = this.parse(url);
      const ledger = parsed ? lookup(parsed.domain) : undefined;
      return !parsed || !ledger || !ledger.isKnown(parsed.path);
    });
  }

  /**
   * The URLs of `urls` that are known but not visited yet, in input order.
   */
  filterUnvisitedUrls(urls: readonly string[]): string[] {
    const lookup = this.ledgerLookup();
    return urls.filter((url) => {
      const parsed = this.parse(url);
      const ledger = parsed ? lookup(parsed.domain) : undefined;
      return (
        parsed !== undefined &&
        ledger !== undefined &&
        ledger.isKnown(parsed.path) &&
        !ledger.hasBeenVisited(parsed.path)
      );
    });
  }

  /** All known URLs of a domain, in queue order. */
  findKnownUrls(domain: string): string[] {
    assertDomainKey(domain);
    const record = this.registry.get(domain);
    if (!record) {
      return [];
    }
    return this.registry
      .readLedger(record, (ledger) => ledger.findKnown())
      .map((path) => record.domain + path);
  }

  /** Unvisited URLs of a domain, in queue order. */
  findUnvisitedUrls(domain: string): string[] {
    assertDomainKey(domain);
    const record = this.registry.get(domain);
    if (!record || record.status !== 'open') {
      return [];
    }
    return this.registry
      .readLedger(record, (ledger) => ledger.findUnvisited())
      .map((path) => record.domain + path);
  }

  // ---------------------------------------------------------------------------
  // Downloads
  // ---------------------------------------------------------------------------

  /**
   * Take the next unvisited URL of a domain and mark it visited now.
   *
   * @returns The full URL, or undefined when the domain is unknown or exhausted
   */
  getUrl(domain: string): string | undefined {
    assertDomainKey(domain);
    const record = this.registry.get(domain);
    if (!record || record.status !== 'open') {
      return undefined;
    }

    const now = Date.now();
    const path = this.registry.updateLedger(record, (ledger) => ledger.popNext(now), now);
    if (path === undefined) {
      return undefined;
    }
    record.count++;
    // A planned fetch may already sit later than now.
    if (record.lastAccess === undefined || now > record.lastAccess) {
      record.lastAccess = now;
    }
    return record.domain + path;
  }

  /**
   * Domains whose next fetch can start within `timeLimit` seconds, with their wait.
   */
  getDownloadableDomains(timeLimit: number): DownloadableDomain[] {
    return this.scheduler.downloadableNow(timeLimit);
  }

  /**
   * One URL from each open domain that was never accessed or was last
   * accessed at least `timeLimit` seconds ago, in domain order.
   */
  getDownloadUrls(timeLimit = 10, maxUrls = 10_000): string[] {
    const now = Date.now();
    const limitMs = timeLimit * 1000;
    const urls: string[] = [];

    for (const record of Array.from(this.registry.values())) {
      if (urls.length >= maxUrls) {
        break;
      }
      if (record.status !== 'open') {
        continue;
      }
      if (record.lastAccess === undefined || now - record.lastAccess >= limitMs) {
        const url = this.getUrl(record.domain);
        if (url !== undefined) {
          urls.push(url);
        }
      }
    }
    return urls;
  }

  /**
   * Plan up to `maxUrls` fetches across domains, none starting later than
   * `timeLimit` seconds from now. Planned URLs are marked visited.
   */
  establishDownloadSchedule(maxUrls = 100, timeLimit = 10): ScheduleEntry[] {
    return this.scheduler.buildSchedule(maxUrls, timeLimit);
  }

  /**
   * Whether any domain has handed out at least `threshold` URLs.
   */
  downloadThresholdReached(threshold: number): boolean {
    for (const record of this.registry.values()) {
      if (record.count >= threshold) {
        return true;
      }
    }
    return false;
  }

  /**
   * Whether an open domain has waited more than `thresholdSeconds` since it
   * could first have been fetched.
   */
  domainThresholdReached(domain: string, thresholdSeconds: number): boolean {
    assertDomainKey(domain);
    return this.scheduler.thresholdReached(domain, thresholdSeconds);
  }

  // ---------------------------------------------------------------------------
  // Crawl rules
  // ---------------------------------------------------------------------------

  /**
   * Store the robots.txt text of a known domain. A Crawl-delay found in it
   * becomes the domain's delay.
   *
   * @returns false when the domain is unknown
   */
  storeRules(domain: string, robotsTxt: string): boolean {
    assertDomainKey(domain);
    const record = this.registry.get(domain);
    if (!record) {
      return false;
    }
    record.rules = this.storage.packText(robotsTxt);
    const delay = crawlDelayFromRules(parseRules(record.domain, robotsTxt), this.config.userAgent);
    if (delay !== undefined) {
      record.crawlDelay = delay;
      record.delaySource = 'rules';
    }
    return true;
  }

  /**
   * Parsed rules of a domain, or undefined when none were stored.
   */
  getRules(domain: string): Robot | undefined {
    assertDomainKey(domain);
    const record = this.registry.get(domain);
    if (!record || record.rules === undefined) {
      return undefined;
    }
    return parseRules(record.domain, this.storage.unpackText(record.rules));
  }

  /**
   * Set the crawl delay of a known domain explicitly.
   *
   * @returns false when the domain is unknown
   */
  setCrawlDelay(domain: string, seconds: number): boolean {
    assertDomainKey(domain);
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new FrontierError(`Invalid crawl delay: ${seconds}`);
    }
    const record = this.registry.get(domain);
    if (!record) {
      return false;
    }
    record.crawlDelay = seconds;
    record.delaySource = 'explicit';
    return true;
  }

  /**
   * The crawl delay taken from rules or set explicitly, else `fallback`.
   */
  getCrawlDelay(domain: string, fallback: number = this.config.defaultCrawlDelay): number {
    assertDomainKey(domain);
    const record = this.registry.get(domain);
    if (record && record.delaySource !== 'default') {
      return record.crawlDelay;
    }
    return fallback;
  }

  // ---------------------------------------------------------------------------
  // Export
  // ---------------------------------------------------------------------------

  /** Every known URL, domain by domain. */
  dumpUrls(): string[] {
    const urls: string[] = [];
    for (const record of this.registry.values()) {
      for (const path of this.registry.readLedger(record, (ledger) => ledger.findKnown())) {
        urls.push(record.domain + path);
      }
    }
    return urls;
  }

  /** Every unvisited URL, domain by domain. */
  dumpUnvisitedUrls(): string[] {
    const urls: string[] = [];
    for (const record of this.registry.values()) {
      if (record.status !== 'open') {
        continue;
      }
      for (const path of this.registry.readLedger(record, (ledger) => ledger.findUnvisited())) {
        urls.push(record.domain + path);
      }
    }
    return urls;
  }

  /**
   * Write every known URL with its visited flag, one `url<TAB>visited` line each.
   */
  printUrls(out: LineSink = process.stdout): void {
    for (const record of this.registry.values()) {
      const entries = this.registry.readLedger(record, (ledger) => ledger.entries());
      if (entries.length === 0) {
        continue;
      }
      out.write(
        entries.map((entry) => `${record.domain}${entry.path}\t${entry.visited}`).join('\n') + '\n',
      );
    }
  }

  /** Write every unvisited URL, one per line. */
  printUnvisitedUrls(out: LineSink = process.stdout): void {
    const urls = this.dumpUnvisitedUrls();
    if (urls.length > 0) {
      out.write(urls.join('\n') + '\n');
    }
  }

  /** Number of URLs handed out, per domain in domain order. */
  getAllCounts(): number[] {
    return Array.from(this.registry.values(), (record) => record.count);
  }

  totalUrlCount(): number {
    let total = 0;
    for (const record of this.registry.values()) {
      total += record.total;
    }
    return total;
  }

  /** Empty the canonicalization cache. */
  clearCache(): void {
    this.cache.clear();
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  /**
   * A plain-object copy of the whole store, suitable for JSON.
   * Calling it does not change the store.
   */
  snapshot(): FrontierSnapshot {
    const { compressed, language, strict, trailingSlash, blocklist } = this.config;
    const { verbose, defaultCrawlDelay, userAgent } = this.config;

    return {
      version: 1,
      createdAt: Date.now(),
      config: {
        compressed,
        language,
        strict,
        trailingSlash,
        blocklist: blocklist === undefined ? undefined : [...blocklist],
        verbose,
        defaultCrawlDelay,
        userAgent,
      },
      domains: Array.from(this.registry.values(), (record) => ({
        domain: record.domain,
        status: record.status,
        crawlDelay: record.crawlDelay,
        delaySource: record.delaySource,
        lastAccess: record.lastAccess,
        openedAt: record.openedAt,
        count: record.count,
        rules: record.rules === undefined ? undefined : this.storage.unpackText(record.rules),
        urls: this.registry.readLedger(record, (ledger) => ledger.toJSON()),
      })),
    };
  }

  /**
   * Build a store from a snapshot.
   *
   * @param data - A value produced by snapshot(), e.g. after a JSON round trip
   * @param overrides - Config values replacing the snapshot's (callbacks, compression)
   * @throws SnapshotError when `data` does not have the snapshot shape
   */
  static restore(data: unknown, overrides: Partial<FrontierConfig> = {}): UrlStore {
    const parsed = snapshotSchema.safeParse(data);
    if (!parsed.success) {
      throw new SnapshotError(
        'Invalid frontier snapshot',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    const snapshot = parsed.data;
    snapshot.domains.forEach((entry) => assertDomainKey(entry.domain));

    const store = new UrlStore({ ...snapshot.config, ...overrides });
    const ledgerOptions = { trailingSlash: store.config.trailingSlash };

    for (const entry of snapshot.domains) {
      const record = store.registry.ensureDomain(entry.domain, entry.openedAt);
      store.registry.saveLedger(record, UrlLedger.fromEntries(entry.urls, ledgerOptions), entry.openedAt);
      store.applyDomainSnapshot(record, entry);
    }
    return store;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private applyDomainSnapshot(record: DomainRecord, entry: FrontierSnapshot['domains'][number]): void {
    if (entry.status === 'discarded') {
      record.status = 'discarded';
    }
    record.crawlDelay = entry.crawlDelay;
    record.delaySource = entry.delaySource;
    record.lastAccess = entry.lastAccess;
    record.openedAt = entry.openedAt;
    record.count = entry.count;
    if (entry.rules !== undefined) {
      record.rules = this.storage.packText(entry.rules);
    }
  }

  private canonicalizeOptions(): CanonicalizeOptions {
    return {
      strict: this.config.strict,
      language: this.config.language,
      blocklist: this.config.blocklist,
    };
  }

  /**
   * Canonical form of a URL for lookups; undefined when canonicalization
   * rejects it (such a URL can never have been stored).
   */
  private parse(url: string): CanonicalUrl | undefined {
    const result = canonicalize(url, this.canonicalizeOptions(), this.cache);
    return result.ok ? result.value : undefined;
  }

  /**
   * Ledger lookup for the duration of one call: each domain's ledger is
   * unpacked at most once.
   */
  private ledgerLookup(): (domain: string) => UrlLedger | undefined {
    const ledgers = new Map<string, UrlLedger | undefined>();
    return (domain) => {
      if (!ledgers.has(domain)) {
        const record = this.registry.get(domain);
        ledgers.set(domain, record ? this.registry.loadLedger(record) : undefined);
      }
      return ledgers.get(domain);
    };
  }
}
