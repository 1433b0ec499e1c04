import type { DownloadableDomain, ScheduleEntry } from '../types.js';
import type { DomainRecord } from './domain.js';
import type { UrlLedger } from './ledger.js';
import type { DomainRegistry } from './registry.js';

/**
 * Milliseconds until a domain may be fetched again: zero when it was never
 * accessed, otherwise what is left of its crawl delay.
 */
export function nextEligibleWait(
  record: Pick<DomainRecord, 'lastAccess' | 'crawlDelay'>,
  now: number,
): number {
  if (record.lastAccess === undefined) {
    return 0;
  }
  return Math.max(0, record.lastAccess + record.crawlDelay * 1000 - now);
}

/** Per-domain planning state for one buildSchedule pass. */
interface PlanSlot {
  record: DomainRecord;
  ledger: UrlLedger;
  nextWait: number;
  scheduled: number;
  lastPlanned?: number;
}

/**
 * Order two slots: smallest wait first, then fewer URLs already scheduled in
 * this pass, then domain key.
 */
function compareSlots(a: PlanSlot, b: PlanSlot): number {
  if (a.nextWait !== b.nextWait) {
    return a.nextWait - b.nextWait;
  }
  if (a.scheduled !== b.scheduled) {
    return a.scheduled - b.scheduled;
  }
  return a.record.domain < b.record.domain ? -1 : a.record.domain > b.record.domain ? 1 : 0;
}

/**
 * Politeness scheduling over the domains of a registry.
 */
export class Scheduler {
  constructor(private readonly registry: DomainRegistry) {}

  /**
   * Open domains whose next fetch can start within `timeLimit` seconds,
   * sorted by wait and then domain.
   */
  downloadableNow(timeLimit: number, now: number = Date.now()): DownloadableDomain[] {
    const limitMs = timeLimit * 1000;
    const result: Array<{ domain: string; waitMs: number }> = [];

    for (const record of this.registry.values()) {
      if (record.status !== 'open') {
        continue;
      }
      const waitMs = nextEligibleWait(record, now);
      if (waitMs <= limitMs) {
        result.push({ domain: record.domain, waitMs });
      }
    }

    result.sort((a, b) =>
      a.waitMs !== b.waitMs ? a.waitMs - b.waitMs : a.domain < b.domain ? -1 : a.domain > b.domain ? 1 : 0,
    );
    return result.map(({ domain, waitMs }) => ({ domain, waitSeconds: waitMs / 1000 }));
  }

  /**
   * Build a timed download plan of at most `maxUrls` entries.
   *
   * Each step takes the candidate domain with the smallest wait, pops one URL
   * from it (marked visited at its planned time) and pushes the domain's next
   * slot back by its crawl delay. Planning stops when `maxUrls` is reached or
   * no domain can start within `timeLimit` seconds. Afterwards each planned
   * domain's last access is the planned time of its last URL.
   */
  buildSchedule(maxUrls: number, timeLimit: number, now: number = Date.now()): ScheduleEntry[] {
    const limitMs = timeLimit * 1000;
    const slots: PlanSlot[] = [];

    for (const record of this.registry.values()) {
      if (record.status !== 'open') {
        continue;
      }
      const nextWait = nextEligibleWait(record, now);
      if (nextWait > limitMs) {
        continue;
      }
      slots.push({
        record,
        ledger: this.registry.loadLedger(record),
        nextWait,
        scheduled: 0,
      });
    }

    const plan: ScheduleEntry[] = [];
    while (plan.length < maxUrls) {
      let best: PlanSlot | undefined;
      for (const slot of slots) {
        if (slot.nextWait > limitMs || slot.ledger.isExhausted()) {
          continue;
        }
        if (!best || compareSlots(slot, best) < 0) {
          best = slot;
        }
      }
      if (!best) {
        break;
      }

      const plannedAt = now + best.nextWait;
      const path = best.ledger.popNext(plannedAt);
      if (path === undefined) {
        break;
      }
      plan.push({
        domain: best.record.domain,
        path,
        url: best.record.domain + path,
        waitSeconds: best.nextWait / 1000,
      });
      best.scheduled++;
      best.lastPlanned = plannedAt;
      best.nextWait += best.record.crawlDelay * 1000;
    }

    for (const slot of slots) {
      if (slot.scheduled === 0) {
        continue;
      }
      slot.record.count += slot.scheduled;
      slot.record.lastAccess = slot.lastPlanned;
      this.registry.saveLedger(slot.record, slot.ledger, now);
    }

    return plan;
  }

  /**
   * Whether an open domain has been waiting for longer than
   * `thresholdSeconds` since it could first have been fetched.
   */
  thresholdReached(domain: string, thresholdSeconds: number, now: number = Date.now()): boolean {
    const record = this.registry.get(domain);
    if (!record || record.status !== 'open') {
      return false;
    }
    const eligibleSince =
      record.lastAccess === undefined
        ? record.openedAt
        : record.lastAccess + record.crawlDelay * 1000;
    return now - eligibleSince > thresholdSeconds * 1000;
  }

  /** Number of domains with at least one unvisited URL. */
  remainingUnvisitedDomainCount(): number {
    let count = 0;
    for (const record of this.registry.values()) {
      if (record.status === 'open') {
        count++;
      }
    }
    return count;
  }
}
