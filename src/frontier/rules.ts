import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const robotsParser = require('robots-parser') as (
  url: string,
  robotstxt: string,
) => Robot;

/**
 * Parsed robots.txt instance from robots-parser library.
 */
export interface Robot {
  isAllowed(url: string, ua?: string): boolean | undefined;
  isDisallowed(url: string, ua?: string): boolean | undefined;
  getCrawlDelay(ua?: string): number | undefined;
  getSitemaps(): string[];
  getPreferredHost(): string | null;
}

/**
 * Parse the robots.txt text stored for a domain.
 *
 * @param domain - Domain key (e.g., "https://example.com")
 * @param robotsTxt - Raw robots.txt content
 */
export function parseRules(domain: string, robotsTxt: string): Robot {
  return robotsParser(`${domain}/robots.txt`, robotsTxt);
}

/**
 * Read the Crawl-delay that applies to `userAgent`, falling back to the
 * wildcard group. Returns undefined when neither sets one.
 *
 * @returns Crawl delay in seconds
 */
export function crawlDelayFromRules(robot: Robot, userAgent: string): number | undefined {
  const delay = robot.getCrawlDelay(userAgent) ?? robot.getCrawlDelay('*');
  if (delay === undefined || !Number.isFinite(delay) || delay < 0) {
    return undefined;
  }
  return delay;
}
