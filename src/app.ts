import type Database from 'better-sqlite3';
import { magickConfig } from './config/index.js';
import { openDatabase } from './db/index.js';
import { createPointSizeRepository, type PointSizeStore } from './db/repositories/point-size.repository.js';
import { createMagickTextMeasurer, type TextMeasurer } from './modules/pointsize/pointsize.measurer.js';
import { createPointSizeCache, type PointSizeCache } from './modules/pointsize/pointsize.service.js';
import { createMagickPosterRenderer, type PosterRenderer } from './modules/posters/poster.renderer.js';

export interface PosterApp {
  db: Database.Database;
  store: PointSizeStore;
  cache: PointSizeCache;
  renderer: PosterRenderer;
}

export interface BuildAppOptions {
  databasePath: string;
  measurer?: TextMeasurer;
  renderer?: PosterRenderer;
}

/**
 * Open the point-size database and wire the cache, measurer and renderer.
 * Throws StoreUnavailableError when the database cannot be opened.
 */
export function buildApp(options: BuildAppOptions): PosterApp {
  const db = openDatabase(options.databasePath);
  const store = createPointSizeRepository(db);

  const measurer =
    options.measurer ??
    createMagickTextMeasurer({ binary: magickConfig.binary, timeoutMs: magickConfig.measureTimeoutMs });
  const renderer =
    options.renderer ??
    createMagickPosterRenderer({ binary: magickConfig.binary, timeoutMs: magickConfig.renderTimeoutMs });

  return {
    db,
    store,
    cache: createPointSizeCache(store, measurer),
    renderer,
  };
}
