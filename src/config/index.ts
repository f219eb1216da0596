import 'dotenv/config';
import { envSchema, type Env } from './env.schema.js';
import { ConfigError } from '../lib/errors.js';

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export const config = loadEnv();

export const storeConfig = {
  databasePath: config.DATABASE_PATH,
};

export const magickConfig = {
  binary: config.MAGICK_BINARY,
  measureTimeoutMs: config.MEASURE_TIMEOUT_MS,
  renderTimeoutMs: config.RENDER_TIMEOUT_MS,
};

export const batchConfig = {
  concurrency: config.CONCURRENCY,
  language: config.LANGUAGE,
  dataDir: config.DATA_DIR,
  translationsDir: config.TRANSLATIONS_DIR,
  fontsDir: config.FONTS_DIR,
  outputDir: config.OUTPUT_DIR,
};
