import type { FrontierConfig } from '../types.js';
import { UrlStore, validateAndMergeConfig } from '../frontier/index.js';
import type { UrlParseCache } from '../urls/cache.js';

/**
 * Create a crawl frontier.
 *
 * This is the main SDK entry point. The partial config is validated and
 * merged over CONFIG_DEFAULTS; every field has a default.
 *
 * @param userConfig - Partial frontier configuration
 * @param cache - Optional canonicalization cache shared with other callers
 * @returns An empty UrlStore
 * @throws FrontierError if a config value is invalid
 *
 * @example
 * ```typescript
 * const frontier = createFrontier({ defaultCrawlDelay: 2 });
 * frontier.addUrls(['https://example.org/a', 'https://example.org/b']);
 *
 * frontier.getUrl('https://example.org'); // 'https://example.org/a'
 *
 * for (const entry of frontier.establishDownloadSchedule(50, 30)) {
 *   console.log(entry.waitSeconds, entry.url);
 * }
 * ```
 */
export function createFrontier(
  userConfig: Partial<FrontierConfig> = {},
  cache?: UrlParseCache,
): UrlStore {
  return new UrlStore(userConfig, cache);
}

// Default export
export default createFrontier;

// Re-export building blocks for advanced usage
export {
  UrlStore,
  UrlLedger,
  DomainRegistry,
  Scheduler,
  getStorage,
  FrontierError,
  InvalidDomainError,
  SnapshotError,
} from '../frontier/index.js';
export type {
  AddUrlsOptions,
  AddFromHtmlOptions,
  LineSink,
  StorageStrategy,
  FrontierSnapshot,
  Robot,
} from '../frontier/index.js';
export {
  canonicalize,
  UrlParseCache,
  DEFAULT_BLOCKLIST,
  isExternal,
  isNavigationPage,
  isNotCrawlable,
  matchesLanguage,
  extractLinks,
} from '../urls/index.js';
export type { CanonicalUrl, CanonicalizeResult, ExtractedLink } from '../urls/index.js';
export { sampleUrls } from '../sampling/index.js';
export type { SampleOptions } from '../sampling/index.js';
export { FrontierDispatcher } from '../crawler/index.js';
export type { DispatcherConfig, DispatchResult, VisitFn } from '../crawler/index.js';
export { CONFIG_DEFAULTS } from '../types.js';
export type {
  FrontierConfig,
  DomainState,
  DomainStatus,
  UrlEntry,
  ScheduleEntry,
  DownloadableDomain,
  CanonicalizeOptions,
} from '../types.js';

export { validateAndMergeConfig };
