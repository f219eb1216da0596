#!/usr/bin/env node
import { join } from 'node:path';
import { parseArgs } from 'node:util';
import { buildApp, type PosterApp } from './app.js';
import { batchConfig, storeConfig } from './config/index.js';
import { closeDatabase } from './db/index.js';
import { logger } from './lib/logger.js';
import { buildVariants, loadCatalog, loadTranslations } from './modules/posters/catalog.service.js';
import { generatePosters } from './modules/posters/poster.service.js';

function parseCli(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'dry-run': { type: 'boolean', default: false },
      language: { type: 'string', short: 'l' },
    },
  });
  return {
    categories: positionals,
    dryRun: values['dry-run'] ?? false,
    language: values.language ?? batchConfig.language,
  };
}

async function main(): Promise<number> {
  const cli = parseCli(process.argv.slice(2));
  logger.info({ language: cli.language, categories: cli.categories, dryRun: cli.dryRun }, 'Starting poster batch run');

  const catalog = loadCatalog(join(batchConfig.dataDir, 'categories.json'));
  const translations = loadTranslations(join(batchConfig.translationsDir, `${cli.language}.yml`));
  const variants = buildVariants(catalog, translations, {
    outputDir: batchConfig.outputDir,
    fontsDir: batchConfig.fontsDir,
    only: cli.categories,
  });

  const app: PosterApp = buildApp({ databasePath: storeConfig.databasePath });
  const controller = new AbortController();

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, stopping batch');
    controller.abort(new Error(`Interrupted by ${signal}`));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  try {
    const summary = await generatePosters(variants, {
      cache: app.cache,
      renderer: app.renderer,
      concurrency: batchConfig.concurrency,
      dryRun: cli.dryRun,
      signal: controller.signal,
    });

    logger.info(
      { ...app.cache.getStats(), ...app.store.getStats() },
      'Point size cache statistics'
    );
    for (const failure of summary.failed) {
      logger.warn(failure, 'Failed poster');
    }

    return summary.failed.length === 0 && !controller.signal.aborted ? 0 : 1;
  } finally {
    closeDatabase(app.db);
  }
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    logger.fatal({ err: error }, 'Poster batch run failed');
    process.exitCode = 1;
  }
);
