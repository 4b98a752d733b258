/**
 * Runtime settings read from the environment.
 */
import { z } from 'zod';

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', ''])
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const envSchema = z.object({
  BLENDPACK_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  BLENDPACK_ZIP_LEVEL: z.coerce.number().int().min(0).max(9).default(1),
  BLENDPACK_ZIP_STORE_BIG_FILES_MB: z.coerce.number().min(0).default(256),
  BLENDPACK_ZIP_NO_COMPRESS: booleanFlag.default('false'),
  BLENDPACK_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface ZipConfig {
  /** Deflate level for compressible entries. */
  readonly level: 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;
  /** Files at least this large are stored uncompressed; 0 disables the rule. */
  readonly storeBigFilesBytes: number;
  /** Store every entry uncompressed. */
  readonly noCompress: boolean;
}

export interface BlendpackConfig {
  readonly concurrency: number;
  readonly zip: ZipConfig;
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
}

export const DEFAULT_CONFIG: BlendpackConfig = {
  concurrency: 4,
  zip: { level: 1, storeBigFilesBytes: 256 * 1024 * 1024, noCompress: false },
  logLevel: 'info',
};

const ZIP_LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

/** Thrown when an environment variable holds an invalid value. */
export class ConfigError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Reads the configuration from `env`. Unset and empty variables take their
 * defaults.
 *
 * @throws {ConfigError} If a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BlendpackConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('BLENDPACK_') && value !== undefined && value !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, parsed.error);
  }
  const values = parsed.data;
  const level = ZIP_LEVELS.find((candidate) => candidate === values.BLENDPACK_ZIP_LEVEL) ?? DEFAULT_CONFIG.zip.level;
  return {
    concurrency: values.BLENDPACK_CONCURRENCY,
    zip: {
      level,
      storeBigFilesBytes: Math.round(values.BLENDPACK_ZIP_STORE_BIG_FILES_MB * 1024 * 1024),
      noCompress: values.BLENDPACK_ZIP_NO_COMPRESS,
    },
    logLevel: values.BLENDPACK_LOG_LEVEL,
  };
}
