import { z } from 'zod';
import { CONFIG_DEFAULTS, type FrontierConfig } from '../types.js';
import { FrontierError } from './errors.js';

const configSchema = z.object({
  compressed: z.boolean(),
  language: z.string().min(1).optional(),
  strict: z.boolean(),
  trailingSlash: z.boolean(),
  blocklist: z.array(z.string().min(1)).optional(),
  verbose: z.boolean(),
  defaultCrawlDelay: z.number().finite().nonnegative(),
  userAgent: z.string().min(1),
});

/**
 * Validate a user-provided partial config and merge it over CONFIG_DEFAULTS.
 *
 * Keys explicitly set to undefined fall back to their default.
 *
 * @throws FrontierError if a value has the wrong type or range
 */
export function validateAndMergeConfig(userConfig: Partial<FrontierConfig> = {}): FrontierConfig {
  const provided = Object.fromEntries(
    Object.entries(userConfig).filter(([, value]) => value !== undefined),
  );
  const result = configSchema.safeParse({ ...CONFIG_DEFAULTS, ...provided });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new FrontierError(`Invalid frontier config: ${issues}`);
  }

  return {
    ...result.data,
    onUrlDiscarded: userConfig.onUrlDiscarded,
    onUnknownUrl: userConfig.onUnknownUrl,
  };
}
