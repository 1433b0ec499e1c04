import blocklist from './blocklist.json' with { type: 'json' };

/**
 * Path segments and parameters marking listing pages rather than content:
 * archives, categories, tags, author pages, pagination.
 */
const NAVIGATION_PATTERN =
  /[/_?&-](?:archives?|author|cat|categor(?:y|ies)|kat|kategorie|page|rubrik|seite|tags?|topics?)(?:[/_=-]|$)/i;

/**
 * Endpoints a crawler gains nothing from: accounts, admin, feeds, search,
 * shopping carts, print and share views.
 */
const NOT_CRAWLABLE_PATTERN =
  /[/?&](?:login|logout|log-in|register|sign-?(?:in|up)|wp-admin|wp-login(?:\.php)?|feed|rss|atom|print|share|search|cart|checkout)(?:[/?&=.]|$)/i;

/** A first path segment that looks like a language tag ("de", "en-us", "pt_BR"). */
const LANGUAGE_SEGMENT_PATTERN = /^[a-z]{2}(?:[-_][a-z]{2})?$/i;

/** Query parameters carrying a language tag. */
export const LANGUAGE_PARAMS: ReadonlySet<string> = new Set(['lang', 'language', 'hl']);

function pathAndQuery(url: string): string | undefined {
  try {
    const parsed = new URL(url);
    return parsed.pathname + parsed.search;
  } catch {
    return undefined;
  }
}

/**
 * Whether a URL points at a navigation page (category, tag, archive, pagination).
 */
export function isNavigationPage(url: string): boolean {
  const target = pathAndQuery(url);
  return target !== undefined && NAVIGATION_PATTERN.test(target);
}

/**
 * Whether a URL points at an endpoint not worth crawling (login, feed, search...).
 */
export function isNotCrawlable(url: string): boolean {
  const target = pathAndQuery(url);
  return target !== undefined && NOT_CRAWLABLE_PATTERN.test(target);
}

function sameLanguage(tag: string, language: string): boolean {
  const primary = tag.toLowerCase().split(/[-_]/)[0];
  return primary === language.toLowerCase().split(/[-_]/)[0];
}

/**
 * Whether a URL is compatible with a target language.
 *
 * A language query parameter wins; otherwise a language-like first path
 * segment is compared. URLs without any language hint match.
 */
export function matchesLanguage(url: string, language: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  for (const param of LANGUAGE_PARAMS) {
    const value = parsed.searchParams.get(param);
    if (value) {
      return sameLanguage(value, language);
    }
  }

  const firstSegment = parsed.pathname.split('/')[1] ?? '';
  if (LANGUAGE_SEGMENT_PATTERN.test(firstSegment)) {
    return sameLanguage(firstSegment, language);
  }
  return true;
}

/** Host names of large platforms that a general crawl usually skips. */
export const DEFAULT_BLOCKLIST: readonly string[] = blocklist;

/** Labels under which registrable names sit one level deeper, as in "example.co.uk". */
const SECOND_LEVEL_LABELS: ReadonlySet<string> = new Set([
  'ac',
  'co',
  'com',
  'edu',
  'gov',
  'ne',
  'net',
  'or',
  'org',
]);

/**
 * The registrable part of a host, "www." removed: "news.example.co.uk" gives
 * `{ domain: "example.co.uk", name: "example" }`. Suffixes are guessed from
 * the labels, no public suffix list is read.
 */
export function registrableDomain(hostname: string): { domain: string; name: string } {
  const labels = hostname.toLowerCase().replace(/^www\d*\./, '').split('.');
  if (labels.length < 2) {
    return { domain: labels[0], name: labels[0] };
  }
  let start = labels.length - 2;
  if (start > 0 && SECOND_LEVEL_LABELS.has(labels[start])) {
    start--;
  }
  return { domain: labels.slice(start).join('.'), name: labels[start] };
}

/**
 * Whether a host is on a blocklist, by its registrable name ("facebook") or
 * its registrable domain ("facebook.com").
 */
export function isBlockedHost(hostname: string, list: readonly string[]): boolean {
  if (list.length === 0) {
    return false;
  }
  const { domain, name } = registrableDomain(hostname);
  return list.includes(name) || list.includes(domain);
}

/**
 * Whether `url` leads to another site than `reference`.
 *
 * Sites are compared by registrable domain, so subdomains count as the same
 * site. With `ignoreSuffix` only the name is compared and "example.org" and
 * "example.de" count as the same site. A URL that cannot be parsed counts as
 * external.
 */
export function isExternal(url: string, reference: string, ignoreSuffix = true): boolean {
  let host: string;
  let referenceHost: string;
  try {
    host = new URL(url).hostname;
    referenceHost = new URL(reference).hostname;
  } catch {
    return true;
  }
  const target = registrableDomain(host);
  const origin = registrableDomain(referenceHost);
  return ignoreSuffix ? target.name !== origin.name : target.domain !== origin.domain;
}
