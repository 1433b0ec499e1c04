import type { DelaySource, DomainState, DomainStatus } from '../types.js';
import type { UrlLedger } from './ledger.js';
import type { StoredLedger, StoredText } from './storage/index.js';

/**
 * Mutable bookkeeping for one domain, owned by the DomainRegistry.
 */
export class DomainRecord {
  status: DomainStatus = 'open';
  delaySource: DelaySource = 'default';
  lastAccess?: number;
  count = 0;
  total = 0;
  rules?: StoredText;

  constructor(
    public domain: string,
    public crawlDelay: number,
    public ledger: StoredLedger,
    public openedAt: number,
  ) {}

  /**
   * Bring status and totals in line with the ledger after a change.
   * A discarded domain stays discarded.
   */
  sync(ledger: UrlLedger, now: number): void {
    this.total = ledger.size;
    if (this.status === 'discarded') {
      return;
    }
    if (ledger.isExhausted()) {
      this.status = 'exhausted';
    } else if (this.status !== 'open') {
      this.status = 'open';
      this.openedAt = now;
    }
  }

  toState(): DomainState {
    const state: DomainState = {
      domain: this.domain,
      status: this.status,
      crawlDelay: this.crawlDelay,
      delaySource: this.delaySource,
      openedAt: this.openedAt,
      total: this.total,
      count: this.count,
      hasRules: this.rules !== undefined,
    };
    if (this.lastAccess !== undefined) {
      state.lastAccess = this.lastAccess;
    }
    return state;
  }
}
