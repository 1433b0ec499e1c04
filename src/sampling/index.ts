import { UrlStore } from '../frontier/store.js';

/** Above this many input URLs the sampling store runs compressed. */
export const COMPRESSION_THRESHOLD = 1_000_000;

/**
 * Options for sampleUrls.
 */
export interface SampleOptions {
  /** Skip domains with fewer non-root URLs than this. */
  excludeMin?: number;
  /** Skip domains with more non-root URLs than this. */
  excludeMax?: number;
  /** Canonicalize in strict mode. */
  strict?: boolean;
  /** Source of randomness in [0, 1). Defaults to Math.random. */
  random?: () => number;

  // Events
  onDomainDiscarded?: (domain: string, size: number) => void;
  onDomainSampled?: (domain: string, sampled: number, size: number) => void;
}

/**
 * Pick `count` distinct items with a partial Fisher-Yates shuffle.
 */
function pickRandom<T>(items: readonly T[], count: number, random: () => number): T[] {
  const pool = [...items];
  const picked: T[] = [];
  for (let i = 0; i < count && i < pool.length; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const chosen = pool[j];
    pool[j] = pool[i];
    pool[i] = chosen;
    picked.push(chosen);
  }
  return picked;
}

/**
 * Sample a list of URLs by domain.
 *
 * URLs are canonicalized and grouped by domain; the root page of each domain
 * is left out. Domains outside the `excludeMin`/`excludeMax` bounds are
 * skipped, larger ones are sampled down to `sampleSize` paths (sorted), and
 * the rest are kept whole.
 *
 * @param inputUrls - Raw URLs
 * @param sampleSize - Maximum number of URLs kept per domain
 * @param options - Size bounds, strictness and event callbacks
 * @returns Full URLs, domain by domain
 */
export function sampleUrls(
  inputUrls: readonly string[],
  sampleSize: number,
  options: SampleOptions = {},
): string[] {
  const random = options.random ?? Math.random;
  const store = new UrlStore({
    compressed: inputUrls.length > COMPRESSION_THRESHOLD,
    strict: options.strict ?? false,
  });
  store.addUrls([...inputUrls].sort());

  const output: string[] = [];
  for (const domain of store.getKnownDomains()) {
    const paths = store
      .findKnownUrls(domain)
      .map((url) => url.slice(domain.length))
      .filter((path) => path !== '/');

    const size = paths.length;
    if (
      size === 0 ||
      (options.excludeMin !== undefined && size < options.excludeMin) ||
      (options.excludeMax !== undefined && size > options.excludeMax)
    ) {
      options.onDomainDiscarded?.(domain, size);
      continue;
    }

    const sample = size > sampleSize ? pickRandom(paths, sampleSize, random).sort() : paths;
    output.push(...sample.map((path) => domain + path));
    options.onDomainSampled?.(domain, sample.length, size);
  }
  return output;
}
