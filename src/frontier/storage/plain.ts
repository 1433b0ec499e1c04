import { UrlLedger } from '../ledger.js';
import { FrontierError } from '../errors.js';
import type { StorageStrategy, StoredLedger, StoredText } from './index.js';

/**
 * Keeps ledgers and rules as live objects. Packing is the identity.
 */
export class PlainStorage implements StorageStrategy {
  readonly compressed = false;

  packLedger(ledger: UrlLedger): StoredLedger {
    return ledger;
  }

  unpackLedger(stored: StoredLedger): UrlLedger {
    if (stored instanceof UrlLedger) {
      return stored;
    }
    throw new FrontierError('Compressed ledger found in an uncompressed store');
  }

  packText(text: string): StoredText {
    return text;
  }

  unpackText(stored: StoredText): string {
    return typeof stored === 'string' ? stored : stored.toString('utf-8');
  }
}
