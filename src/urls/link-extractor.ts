import { JSDOM } from 'jsdom';
import { isExternal } from './filters.js';

/**
 * A link found in an HTML page.
 */
export interface ExtractedLink {
  /** Absolute URL of the link target, fragment removed. */
  url: string;
  /** The link text, whitespace collapsed. */
  text: string;
  /** Whether the link carries rel="nofollow". */
  nofollow: boolean;
}

/**
 * Options for link extraction.
 */
export interface ExtractLinksOptions {
  /**
   * Keep links to other sites. Subdomains of the page's site count as
   * internal. Defaults to false.
   */
  external?: boolean;
  /** Drop links marked rel="nofollow". Defaults to false. */
  skipNofollow?: boolean;
}

/** Link targets that never lead to a page. */
const NON_PAGE_HREF = /^(?:#|mailto:|javascript:|tel:|data:)/i;

/**
 * Resolve an href to an absolute http(s) URL without fragment, or undefined
 * when it does not point at a page.
 */
function resolveHref(href: string, baseUrl: string): URL | undefined {
  if (href === '' || NON_PAGE_HREF.test(href)) {
    return undefined;
  }
  let target: URL;
  try {
    target = new URL(href, baseUrl);
  } catch {
    return undefined;
  }
  if (target.protocol !== 'http:' && target.protocol !== 'https:') {
    return undefined;
  }
  target.hash = '';
  return target;
}

function isNofollow(rel: string | null): boolean {
  return (rel ?? '').toLowerCase().split(/\s+/).includes('nofollow');
}

/**
 * Extract link targets from an HTML page.
 *
 * Relative targets are resolved against the page URL (or its `<base href>`),
 * only http/https targets are kept, and each target appears once, in
 * document order.
 */
export function extractLinks(
  html: string,
  pageUrl: string,
  options: ExtractLinksOptions = {},
): ExtractedLink[] {
  let page: URL;
  try {
    page = new URL(pageUrl);
  } catch {
    return [];
  }

  const { document } = new JSDOM(html, { url: page.href }).window;
  const links = new Map<string, ExtractedLink>();

  for (const anchor of Array.from(document.querySelectorAll('a[href]'))) {
    const target = resolveHref(anchor.getAttribute('href')?.trim() ?? '', document.baseURI);
    if (!target || links.has(target.href)) {
      continue;
    }
    if (!options.external && isExternal(target.href, page.href, false)) {
      continue;
    }
    const nofollow = isNofollow(anchor.getAttribute('rel'));
    if (nofollow && options.skipNofollow) {
      continue;
    }
    links.set(target.href, {
      url: target.href,
      text: (anchor.textContent ?? '').replace(/\s+/g, ' ').trim(),
      nofollow,
    });
  }

  return Array.from(links.values());
}
