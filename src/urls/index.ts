export { canonicalize } from './canonicalize.js';
export type { CanonicalUrl, CanonicalizeResult } from './canonicalize.js';
export { UrlParseCache, DEFAULT_CACHE_SIZE } from './cache.js';
export {
  DEFAULT_BLOCKLIST,
  isBlockedHost,
  isExternal,
  isNavigationPage,
  isNotCrawlable,
  matchesLanguage,
  registrableDomain,
} from './filters.js';
export { extractLinks } from './link-extractor.js';
export type { ExtractedLink, ExtractLinksOptions } from './link-extractor.js';
