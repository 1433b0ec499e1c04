import type { DomainState } from '../types.js';
import { DomainRecord } from './domain.js';
import { UrlLedger, type LedgerOptions } from './ledger.js';
import type { StorageStrategy } from './storage/index.js';

/**
 * Options for a DomainRegistry.
 */
export interface RegistryOptions {
  /** Crawl delay in seconds given to new domains. */
  defaultCrawlDelay: number;
  storage: StorageStrategy;
  ledger: LedgerOptions;
}

const HTTP = 'http://';
const HTTPS = 'https://';

/**
 * Maps domain keys to their DomainRecord and stored ledger.
 *
 * Records keep insertion order, which is the order every domain-wide
 * enumeration (dump, counts, download URLs) follows.
 */
export class DomainRegistry {
  private records = new Map<string, DomainRecord>();

  constructor(private readonly options: RegistryOptions) {}

  /**
   * Resolve the key under which a domain is stored, without changing anything.
   * An http key falls back to a stored https twin and vice versa.
   */
  lookupKey(domain: string): string {
    if (this.records.has(domain)) {
      return domain;
    }
    const twin = protocolTwin(domain);
    return twin !== undefined && this.records.has(twin) ? twin : domain;
  }

  /**
   * Resolve the key for an insertion. Adding under http when https is known
   * routes to the https record; adding under https when only http is known
   * moves the http record to the https key.
   */
  resolveKey(domain: string): string {
    if (this.records.has(domain)) {
      return domain;
    }
    if (domain.startsWith(HTTP)) {
      const secure = HTTPS + domain.slice(HTTP.length);
      return this.records.has(secure) ? secure : domain;
    }
    if (domain.startsWith(HTTPS)) {
      const insecure = HTTP + domain.slice(HTTPS.length);
      const record = this.records.get(insecure);
      if (record) {
        this.records.delete(insecure);
        record.domain = domain;
        this.records.set(domain, record);
      }
    }
    return domain;
  }

  /**
   * Return the record for a domain, creating it when absent.
   */
  ensureDomain(domain: string, now: number = Date.now()): DomainRecord {
    let record = this.records.get(domain);
    if (!record) {
      const ledger = new UrlLedger(this.options.ledger);
      record = new DomainRecord(
        domain,
        this.options.defaultCrawlDelay,
        this.options.storage.packLedger(ledger),
        now,
      );
      this.records.set(domain, record);
    }
    return record;
  }

  get(domain: string): DomainRecord | undefined {
    return this.records.get(this.lookupKey(domain));
  }

  has(domain: string): boolean {
    return this.records.has(this.lookupKey(domain));
  }

  getDomainState(domain: string): DomainState | undefined {
    return this.get(domain)?.toState();
  }

  /**
   * Domain keys as a lazy, restartable sequence. Each iteration walks the
   * keys present when that iteration started.
   */
  allDomains(): Iterable<string> {
    const records = this.records;
    return {
      [Symbol.iterator]: () => Array.from(records.keys())[Symbol.iterator](),
    };
  }

  /** Records in insertion order. */
  values(): IterableIterator<DomainRecord> {
    return this.records.values();
  }

  /**
   * Run `fn` on a record's unpacked ledger without writing it back.
   */
  readLedger<T>(record: DomainRecord, fn: (ledger: UrlLedger) => T): T {
    return fn(this.options.storage.unpackLedger(record.ledger));
  }

  /**
   * Unpack a record's ledger for a series of changes. Pair with saveLedger.
   */
  loadLedger(record: DomainRecord): UrlLedger {
    return this.options.storage.unpackLedger(record.ledger);
  }

  /**
   * Write a ledger back and bring the record's status in line with it.
   */
  saveLedger(record: DomainRecord, ledger: UrlLedger, now: number = Date.now()): void {
    record.ledger = this.options.storage.packLedger(ledger);
    record.sync(ledger, now);
  }

  /**
   * Run `fn` on a record's ledger and write the result back.
   */
  updateLedger<T>(
    record: DomainRecord,
    fn: (ledger: UrlLedger) => T,
    now: number = Date.now(),
  ): T {
    const ledger = this.loadLedger(record);
    const result = fn(ledger);
    this.saveLedger(record, ledger, now);
    return result;
  }

  /**
   * Replace a record's ledger with an empty one.
   */
  emptyLedger(record: DomainRecord, now: number = Date.now()): void {
    this.saveLedger(record, new UrlLedger(this.options.ledger), now);
  }

  clear(): void {
    this.records.clear();
  }

  get size(): number {
    return this.records.size;
  }
}

function protocolTwin(domain: string): string | undefined {
  if (domain.startsWith(HTTP)) {
    return HTTPS + domain.slice(HTTP.length);
  }
  if (domain.startsWith(HTTPS)) {
    return HTTP + domain.slice(HTTPS.length);
  }
  return undefined;
}
