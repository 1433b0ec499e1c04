import { z } from 'zod';

/**
 * Shape of a stored URL entry.
 */
export const urlEntrySchema = z.object({
  path: z.string().min(1),
  visited: z.boolean(),
  visitedAt: z.number().finite().optional(),
});

export const urlEntriesSchema = z.array(urlEntrySchema);

/**
 * Shape of one domain inside a snapshot.
 */
export const domainSnapshotSchema = z.object({
  domain: z.string().min(1),
  status: z.enum(['open', 'exhausted', 'discarded']),
  crawlDelay: z.number().nonnegative(),
  delaySource: z.enum(['default', 'rules', 'explicit']),
  lastAccess: z.number().finite().optional(),
  openedAt: z.number().finite(),
  count: z.number().int().nonnegative(),
  rules: z.string().optional(),
  urls: urlEntriesSchema,
});

/**
 * Shape of a full store snapshot.
 */
export const snapshotSchema = z.object({
  version: z.literal(1),
  createdAt: z.number().finite(),
  config: z.object({
    compressed: z.boolean(),
    language: z.string().optional(),
    strict: z.boolean(),
    trailingSlash: z.boolean(),
    blocklist: z.array(z.string()).optional(),
    verbose: z.boolean(),
    defaultCrawlDelay: z.number().nonnegative(),
    userAgent: z.string(),
  }),
  domains: z.array(domainSnapshotSchema),
});

export type DomainSnapshot = z.infer<typeof domainSnapshotSchema>;
export type FrontierSnapshot = z.infer<typeof snapshotSchema>;
