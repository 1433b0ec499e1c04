import type { CanonicalizeOptions } from '../types.js';
import type { UrlParseCache } from './cache.js';
import { LANGUAGE_PARAMS, isBlockedHost, isNotCrawlable, matchesLanguage } from './filters.js';

/**
 * A canonical URL split into its domain key and the path stored under it.
 */
export interface CanonicalUrl {
  /** Full canonical URL (`domain + path`). */
  url: string;
  /** Scheme and host, e.g. "https://example.org". */
  domain: string;
  /** Path and query, "/" for the root. */
  path: string;
}

/**
 * Outcome of canonicalization: the URL, or the reason it was rejected.
 */
export type CanonicalizeResult =
  | { ok: true; value: CanonicalUrl }
  | { ok: false; reason: string };

/** Query parameters kept in strict mode, on top of the language parameters. */
const ALLOWED_PARAMS: ReadonlySet<string> = new Set([
  'aid',
  'article_id',
  'artnr',
  'id',
  'itemid',
  'objectid',
  'p',
  'page',
  'pagenum',
  'page_id',
  'pid',
  'post',
  'postid',
  'product_id',
]);

/** Campaign and click tracking parameters, always dropped. */
const TRACKING_PARAM_PATTERN =
  /^(?:utm_\w+|fbclid|gclid|dclid|msclkid|yclid|mc_cid|mc_eid|_ga|ref_src|igshid)$/i;

const ACCEPTED_PROTOCOLS: ReadonlySet<string> = new Set(['http:', 'https:']);

function reject(reason: string): CanonicalizeResult {
  return { ok: false, reason };
}

/**
 * Rebuild the query string: tracking parameters removed, parameters sorted by
 * key, and in strict mode only the allowed set kept.
 */
function cleanQuery(params: URLSearchParams, strict: boolean): string {
  const kept: Array<[string, string]> = [];
  for (const [key, value] of params) {
    const lower = key.toLowerCase();
    if (TRACKING_PARAM_PATTERN.test(lower)) {
      continue;
    }
    if (strict && !ALLOWED_PARAMS.has(lower) && !LANGUAGE_PARAMS.has(lower)) {
      continue;
    }
    kept.push([key, value]);
  }
  if (kept.length === 0) {
    return '';
  }
  kept.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return '?' + new URLSearchParams(kept).toString();
}

function canonicalizeUncached(rawUrl: string, options: CanonicalizeOptions): CanonicalizeResult {
  const trimmed = rawUrl.trim();
  if (trimmed === '') {
    return reject('empty URL');
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return reject('malformed URL');
  }

  if (!ACCEPTED_PROTOCOLS.has(parsed.protocol)) {
    return reject(`unsupported scheme "${parsed.protocol}"`);
  }

  const hostname = parsed.hostname;
  if (!hostname.includes('.') && !hostname.startsWith('[') && hostname !== 'localhost') {
    return reject('invalid host');
  }
  if (options.blocklist && isBlockedHost(hostname, options.blocklist)) {
    return reject('blacklisted domain');
  }

  // URL has already lowercased the host and dropped a default port.
  const domain = `${parsed.protocol}//${parsed.host}`;
  const path = parsed.pathname + cleanQuery(parsed.searchParams, options.strict ?? false);
  const url = domain + path;

  if (options.language && !matchesLanguage(url, options.language)) {
    return reject(`language does not match "${options.language}"`);
  }
  if (options.strict && isNotCrawlable(url)) {
    return reject('not crawlable');
  }

  return { ok: true, value: { url, domain, path } };
}

/**
 * Turn a raw URL into its canonical form and domain key, or reject it.
 *
 * - only absolute http/https URLs with a real host are accepted
 * - credentials, fragment and default port are dropped
 * - tracking parameters are removed and the rest sorted by key
 * - strict mode keeps only a known set of parameters and rejects
 *   non-crawlable endpoints
 * - with a language set, URLs carrying another language are rejected
 * - hosts on the blocklist are rejected
 *
 * @param rawUrl - The URL as found
 * @param options - Strictness, target language and blocklist
 * @param cache - Optional caller-owned cache of results
 */
export function canonicalize(
  rawUrl: string,
  options: CanonicalizeOptions = {},
  cache?: UrlParseCache,
): CanonicalizeResult {
  if (!cache) {
    return canonicalizeUncached(rawUrl, options);
  }
  const key = [
    options.strict ? 1 : 0,
    options.language ?? '',
    options.blocklist?.join(',') ?? '',
    rawUrl,
  ].join('|');
  const cached = cache.get(key);
  if (cached) {
    return cached;
  }
  const result = canonicalizeUncached(rawUrl, options);
  cache.set(key, result);
  return result;
}
