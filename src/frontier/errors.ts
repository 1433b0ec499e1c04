/**
 * Base class for errors raised by the frontier store.
 */
export class FrontierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrontierError';
  }
}

/**
 * Thrown when an operation receives a domain key that is not of the form
 * `scheme://host[:port]` (empty string, missing scheme, trailing path).
 */
export class InvalidDomainError extends FrontierError {
  constructor(public readonly domain: string) {
    super(`Invalid domain key: "${domain}"`);
    this.name = 'InvalidDomainError';
  }
}

/**
 * Thrown when a snapshot handed to restore does not have the expected shape.
 */
export class SnapshotError extends FrontierError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'SnapshotError';
  }
}

/** Matches `scheme://host[:port]` with nothing after the authority. */
const DOMAIN_KEY_PATTERN = /^[a-z][a-z0-9+.-]*:\/\/[^/?#\s]+$/i;

/**
 * Throw an InvalidDomainError unless `domain` is a structurally valid key.
 */
export function assertDomainKey(domain: string): void {
  if (typeof domain !== 'string' || !DOMAIN_KEY_PATTERN.test(domain)) {
    throw new InvalidDomainError(String(domain));
  }
}
