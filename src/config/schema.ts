import { z } from 'zod';

export const DEFAULT_SINGLE_SUFFIX = 'single';
export const DEFAULT_KEY_DELIMITER = '_';

export const CacheEngineConfigSchema = z
  .object({
    singleSuffix: z.string().min(1).default(DEFAULT_SINGLE_SUFFIX),
    keyDelimiter: z.string().min(1).default(DEFAULT_KEY_DELIMITER),
    logFetchErrors: z.boolean().default(true),
  })
  .strict();

export type CacheEngineConfig = z.infer<typeof CacheEngineConfigSchema>;
export type CacheEngineConfigInput = z.input<typeof CacheEngineConfigSchema>;
