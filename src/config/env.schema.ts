import { z } from 'zod';

/** `en`, `de`, `pt-BR`, `zh_Hant` */
export const LANGUAGE_CODE_PATTERN = /^[a-z]{2}(?:[-_][A-Za-z]{2,4})?$/;

export const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('./data/pointsize-cache.db'),

  MAGICK_BINARY: z.string().min(1).default('magick'),
  MEASURE_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  CONCURRENCY: z.coerce.number().int().min(1, 'CONCURRENCY must be at least 1').default(4),

  LANGUAGE: z
    .string()
    .regex(LANGUAGE_CODE_PATTERN, 'LANGUAGE must be a language code such as "en" or "pt-BR"')
    .default('en'),
  DATA_DIR: z.string().default('./data'),
  TRANSLATIONS_DIR: z.string().default('./data/translations'),
  FONTS_DIR: z.string().default('./fonts'),
  OUTPUT_DIR: z.string().default('./output'),

  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

export type Env = z.infer<typeof envSchema>;
