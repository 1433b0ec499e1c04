import type { UrlLedger, LedgerOptions } from '../ledger.js';
import { PlainStorage } from './plain.js';
import { CompressedStorage } from './compressed.js';

/** A ledger as held by the registry: live, or encoded. */
export type StoredLedger = UrlLedger | Buffer;

/** A text blob (robots rules) as held by the registry. */
export type StoredText = string | Buffer;

/**
 * Storage strategy interface.
 *
 * The registry only ever holds packed values; all ledger logic runs on
 * unpacked ones, so the representation stays behind this boundary.
 */
export interface StorageStrategy {
  readonly compressed: boolean;
  packLedger(ledger: UrlLedger): StoredLedger;
  unpackLedger(stored: StoredLedger): UrlLedger;
  packText(text: string): StoredText;
  unpackText(stored: StoredText): string;
}

export { PlainStorage } from './plain.js';
export { CompressedStorage } from './compressed.js';

/**
 * Resolve the storage strategy for a store.
 *
 * @param compressed - Whether to hold ledgers and rules compressed
 * @param ledgerOptions - Options for ledgers rebuilt from their encoded form
 */
export function getStorage(compressed: boolean, ledgerOptions: LedgerOptions): StorageStrategy {
  return compressed ? new CompressedStorage(ledgerOptions) : new PlainStorage();
}
