import pLimit from 'p-limit';
import { describeQuery } from '../../lib/cache-key.js';
import { AppError, StoreUnavailableError, errorMessage } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { PointSizeCache } from '../pointsize/pointsize.service.js';
import type { PosterVariant } from './catalog.service.js';
import type { PosterRenderer } from './poster.renderer.js';

const logger = createChildLogger('poster-service');

export interface GeneratePostersOptions {
  cache: PointSizeCache;
  renderer: PosterRenderer;
  concurrency: number;
  /** Resolve point sizes (warming the cache) without rendering */
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface PosterFailure {
  category: string;
  id: string;
  /** Text, font, box and point-size range of the failed variant */
  query: string;
  code: string;
  message: string;
}

export interface BatchSummary {
  total: number;
  resolved: number;
  rendered: number;
  skipped: number;
  failed: PosterFailure[];
}

/**
 * Generate one poster per variant: resolve its point size through the cache,
 * then hand it to the renderer.
 *
 * A variant that fails is reported and the batch carries on. A store failure
 * stops the batch, and so does an aborted signal; variants not yet started
 * are counted as skipped.
 */
export async function generatePosters(
  variants: PosterVariant[],
  options: GeneratePostersOptions
): Promise<BatchSummary> {
  const { cache, renderer, concurrency, dryRun = false, signal } = options;
  const limit = pLimit(concurrency);
  const summary: BatchSummary = { total: variants.length, resolved: 0, rendered: 0, skipped: 0, failed: [] };
  const state: { fatal: StoreUnavailableError | null } = { fatal: null };

  logger.info({ total: variants.length, concurrency, dryRun }, 'Starting poster batch');

  const generateOne = async (variant: PosterVariant): Promise<void> => {
    if (state.fatal || signal?.aborted) {
      summary.skipped++;
      return;
    }

    try {
      const pointSize = await cache.resolve(
        variant.text,
        variant.font,
        variant.box.width,
        variant.box.height,
        variant.pointSize.min,
        variant.pointSize.max,
        signal
      );
      summary.resolved++;

      if (dryRun) return;

      await renderer.render(
        {
          text: variant.text,
          font: variant.font,
          pointSize,
          canvas: variant.canvas,
          box: variant.box,
          background: variant.background,
          textColor: variant.textColor,
          outputPath: variant.outputPath,
        },
        signal
      );
      summary.rendered++;
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        state.fatal ??= error;
        summary.skipped++;
        return;
      }
      if (signal?.aborted) {
        summary.skipped++;
        return;
      }

      logger.error(
        {
          err: error,
          category: variant.category,
          id: variant.id,
          text: variant.text,
          font: variant.font,
          box: `${variant.box.width}x${variant.box.height}`,
          pointSize: variant.pointSize,
        },
        'Poster variant failed'
      );
      summary.failed.push({
        category: variant.category,
        id: variant.id,
        query: describeQuery({
          text: variant.text,
          font: variant.font,
          boxWidth: variant.box.width,
          boxHeight: variant.box.height,
          minPointSize: variant.pointSize.min,
          maxPointSize: variant.pointSize.max,
        }),
        code: error instanceof AppError ? error.code : 'UNEXPECTED',
        message: errorMessage(error),
      });
    }
  };

  await Promise.all(variants.map((variant) => limit(() => generateOne(variant))));

  if (state.fatal) {
    logger.error({ err: state.fatal, ...summary, failed: summary.failed.length }, 'Poster batch aborted');
    throw state.fatal;
  }

  logger.info(
    { ...summary, failed: summary.failed.length, aborted: signal?.aborted ?? false },
    'Poster batch finished'
  );
  return summary;
}
