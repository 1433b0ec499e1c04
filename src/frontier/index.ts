export { UrlStore } from './store.js';
export type { AddUrlsOptions, AddFromHtmlOptions, LineSink } from './store.js';
export { UrlLedger, trailingSlashVariant } from './ledger.js';
export type { AddResult, LedgerOptions } from './ledger.js';
export { DomainRegistry } from './registry.js';
export type { RegistryOptions } from './registry.js';
export { DomainRecord } from './domain.js';
export { Scheduler, nextEligibleWait } from './scheduler.js';
export { validateAndMergeConfig } from './config.js';
export { parseRules, crawlDelayFromRules } from './rules.js';
export type { Robot } from './rules.js';
export { snapshotSchema } from './schema.js';
export type { FrontierSnapshot, DomainSnapshot } from './schema.js';
export { getStorage, PlainStorage, CompressedStorage } from './storage/index.js';
export type { StorageStrategy, StoredLedger, StoredText } from './storage/index.js';
export {
  FrontierError,
  InvalidDomainError,
  SnapshotError,
  assertDomainKey,
} from './errors.js';
