import { z } from 'zod';

import { Algorithm, type CacheConfiguration, type KeyMaker } from '@memokit/types';

import { ConfigurationError } from '@/utils/errors';
import logger from '@/utils/logger';

const CacheOptionsValidator = z
  .object({
    ttl: z.number().finite().positive().optional(),
    maxSize: z.number().int().positive().optional(),
    algorithm: z.nativeEnum(Algorithm).default(Algorithm.LRU),
    threadSafe: z.boolean().default(true),
    keyMaker: z.custom<KeyMaker>((value) => typeof value === 'function', 'keyMaker must be a function').optional(),
  })
  .strict();

/**
 * Validates cache options and applies the defaults for everything not provided.
 * @param options - The options passed when creating a cache. Accepts any value, since options may come from
 *  untyped callers.
 * @returns The validated configuration.
 * @throws {ConfigurationError} If any option is invalid.
 */
export function parseCacheOptions(options: unknown = {}): CacheConfiguration {
  logger.debug('Validating cache options');
  const validated = CacheOptionsValidator.safeParse(options);

  if (!validated.success) {
    const errorMessage = validated.error.errors.reduce(
      (message, error) => message.concat(`\n  ${error.path.join('.')}: ${error.code}`),
      '',
    );
    logger.error(`Invalid cache options: ${errorMessage}`);
    throw new ConfigurationError({ detail: errorMessage.trim() });
  }

  const { ttl, maxSize, algorithm, threadSafe, keyMaker } = validated.data;
  return { ttl, maxSize, algorithm, threadSafe, keyMaker };
}
