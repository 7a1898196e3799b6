import { z } from 'zod';

const boolFromEnv = z.preprocess((value) => {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    return normalized === 'true' || normalized === '1' || normalized === 'yes';
  }

  return value;
}, z.boolean());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.string().default('warn'),
  ROWFOLD_DEFAULT_DELIMITER: z.string().min(1).default(','),
  ROWFOLD_STREAM_HIGH_WATER_MARK: z.coerce.number().int().positive().default(65536),
  ROWFOLD_SKIP_EMPTY_LINES: boolFromEnv.default(true)
});

export type AppConfig = {
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: string;
  defaultDelimiter: string;
  streamHighWaterMark: number;
  skipEmptyLines: boolean;
};

let cache: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (cache) {
    return cache;
  }

  const env = envSchema.parse(process.env);

  cache = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    defaultDelimiter: env.ROWFOLD_DEFAULT_DELIMITER,
    streamHighWaterMark: env.ROWFOLD_STREAM_HIGH_WATER_MARK,
    skipEmptyLines: env.ROWFOLD_SKIP_EMPTY_LINES
  };

  return cache;
};

export const resetConfigCache = (): void => {
  cache = null;
};
