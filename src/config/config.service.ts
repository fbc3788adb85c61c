import path from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenvConfig();

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const configSchema = z.object({
  app: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    environment: z.enum(['development', 'production', 'test']).default('development'),
  }),
  storage: z.object({
    dataDir: z.string().min(1),
    linkFilesDir: z.string().min(1),
  }),
  ingestion: z.object({
    trimTrailingClosers: z.boolean().default(false),
  }),
  downloads: z.object({
    slots: z.number().int().min(1).max(16).default(2),
    maxRetries: z.number().int().min(0).default(2),
    stopPolicy: z.enum(['finish', 'abort']).default('finish'),
    command: z.string().min(1).default('gallery-dl'),
    args: z.array(z.string()).default(['--write-metadata', '--write-info-json']),
    autoStart: z.boolean().default(false),
  }),
  limits: z.object({
    maxItems: z.number().int().positive().optional(),
    maxBytes: z.number().int().positive().optional(),
    maxElapsedMs: z.number().int().positive().optional(),
    sampleIntervalMs: z.number().int().positive().default(1000),
  }),
  server: z.object({
    enabled: z.boolean().default(true),
    port: z.number().int().positive().default(8917),
    host: z.string().default('127.0.0.1'),
  }),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return booleanFlag.parse(value.trim().toLowerCase());
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Builds and validates the configuration from environment variables.
 * Throws a ZodError when a value is out of range.
 */
export function parseConfig(env: Env): Config {
  const dataDir = env.DATA_DIR || './data';
  const maxSeconds = parseInteger(env.LIMIT_MAX_SECONDS);
  const maxFileSizeMb = parseInteger(env.LIMIT_MAX_FILE_SIZE_MB);

  const rawConfig = {
    app: {
      logLevel: env.LOG_LEVEL || (env.NODE_ENV === 'production' ? 'info' : 'warn'),
      environment: env.NODE_ENV || 'development',
    },
    storage: {
      dataDir,
      linkFilesDir: env.LINK_FILES_DIR || path.join(dataDir, 'Link_files'),
    },
    ingestion: {
      trimTrailingClosers: parseFlag(env.TRIM_TRAILING_CLOSERS),
    },
    downloads: {
      slots: parseInteger(env.DOWNLOAD_SLOTS),
      maxRetries: parseInteger(env.DOWNLOAD_MAX_RETRIES),
      stopPolicy: env.DOWNLOAD_STOP_POLICY,
      command: env.DOWNLOAD_COMMAND,
      args: parseList(env.DOWNLOAD_ARGS),
      autoStart: parseFlag(env.AUTO_START_DOWNLOADS),
    },
    limits: {
      maxItems: parseInteger(env.LIMIT_MAX_ITEMS),
      maxBytes: maxFileSizeMb === undefined ? undefined : maxFileSizeMb * 1024 * 1024,
      maxElapsedMs: maxSeconds === undefined ? undefined : maxSeconds * 1000,
      sampleIntervalMs: parseInteger(env.LIMIT_SAMPLE_INTERVAL_MS),
    },
    server: {
      enabled: parseFlag(env.CONTROL_ENABLED),
      port: parseInteger(env.CONTROL_PORT),
      host: env.CONTROL_HOST,
    },
  };

  return configSchema.parse(rawConfig);
}

function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    console.error('Configuration validation failed:', error);
    process.exit(1);
  }
}

export const config = loadConfig();
