import { brotliCompressSync, brotliDecompressSync, constants } from 'node:zlib';
import { UrlLedger, type LedgerOptions } from '../ledger.js';
import { urlEntriesSchema } from '../schema.js';
import type { StorageStrategy, StoredLedger, StoredText } from './index.js';

/** Brotli quality; low levels keep the per-call CPU cost small. */
const BROTLI_QUALITY = 4;

function compress(text: string): Buffer {
  return brotliCompressSync(Buffer.from(text, 'utf-8'), {
    params: { [constants.BROTLI_PARAM_QUALITY]: BROTLI_QUALITY },
  });
}

function decompress(data: Buffer): string {
  return brotliDecompressSync(data).toString('utf-8');
}

/**
 * Holds each ledger as one brotli-compressed JSON buffer and rules text as a
 * compressed buffer. Every read decodes; every write re-encodes.
 */
export class CompressedStorage implements StorageStrategy {
  readonly compressed = true;

  constructor(private readonly ledgerOptions: LedgerOptions) {}

  packLedger(ledger: UrlLedger): StoredLedger {
    return compress(JSON.stringify(ledger.toJSON()));
  }

  unpackLedger(stored: StoredLedger): UrlLedger {
    if (stored instanceof UrlLedger) {
      return stored;
    }
    const entries = urlEntriesSchema.parse(JSON.parse(decompress(stored)));
    return UrlLedger.fromEntries(entries, this.ledgerOptions);
  }

  packText(text: string): StoredText {
    return compress(text);
  }

  unpackText(stored: StoredText): string {
    return typeof stored === 'string' ? stored : decompress(stored);
  }
}
