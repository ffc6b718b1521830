import { z } from 'zod';
import { Clock, Logger } from './Types';
import { ConfigError } from './Errors';

export const STORE_FILE_ENV_VAR = 'KVSTORE_FILE';

export interface StoreConfig {
  filePath: string;
  now?: Clock;
  logger?: Logger;
}

export interface ResolvedStoreConfig {
  readonly filePath: string;
  readonly now: Clock;
  readonly logger: Logger;
}

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export const DEFAULT_CONFIG: ResolvedStoreConfig = {
  filePath: '.env',
  now: systemClock,
  logger: console,
};

const filePathSchema = z
  .string({ invalid_type_error: 'filePath must be a string' })
  .trim()
  .min(1, 'filePath must not be empty');

/**
 * Merge explicit options, the KVSTORE_FILE environment variable and the
 * defaults, in that order of precedence.
 */
export function resolveStoreConfig(
  config: Partial<StoreConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedStoreConfig {
  const fromEnv = env[STORE_FILE_ENV_VAR] || undefined;
  const candidate = config.filePath ?? fromEnv ?? DEFAULT_CONFIG.filePath;

  const parsed = filePathSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(`Invalid store configuration: ${parsed.error.issues.map(i => i.message).join(', ')}`);
  }

  return {
    filePath: parsed.data,
    now: config.now ?? DEFAULT_CONFIG.now,
    logger: config.logger ?? DEFAULT_CONFIG.logger,
  };
}
