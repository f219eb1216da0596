import type { PointSizeStore } from '../../db/repositories/point-size.repository.js';
import { describeQuery, pointSizeCacheKey, type PointSizeQuery } from '../../lib/cache-key.js';
import { MeasurementError, ValidationError } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { TextMeasurer } from './pointsize.measurer.js';

const logger = createChildLogger('pointsize-cache');

export interface PointSizeCacheStats {
  hits: number;
  misses: number;
  /** Requests that joined a measurement already running for the same query */
  shared: number;
  /** Misses whose measured size fell below the minimum (text will be cut off) */
  truncated: number;
}

export interface PointSizeCache {
  resolve(
    text: string,
    font: string,
    boxWidth: number,
    boxHeight: number,
    minPointSize: number,
    maxPointSize: number,
    signal?: AbortSignal
  ): Promise<number>;
  resolveQuery(query: PointSizeQuery, signal?: AbortSignal): Promise<number>;
  getStats(): PointSizeCacheStats;
}

interface InFlightMeasurement {
  promise: Promise<number>;
  signal: AbortSignal | undefined;
}

export function clampPointSize(raw: number, minPointSize: number, maxPointSize: number): number {
  return Math.max(minPointSize, Math.min(maxPointSize, raw));
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`, { [name]: value });
  }
}

function validateQuery(query: PointSizeQuery): void {
  assertPositiveInteger('boxWidth', query.boxWidth);
  assertPositiveInteger('boxHeight', query.boxHeight);
  assertPositiveInteger('minPointSize', query.minPointSize);
  assertPositiveInteger('maxPointSize', query.maxPointSize);
  if (query.minPointSize > query.maxPointSize) {
    throw new ValidationError(
      `minPointSize (${query.minPointSize}) is greater than maxPointSize (${query.maxPointSize})`,
      { minPointSize: query.minPointSize, maxPointSize: query.maxPointSize }
    );
  }
}

/**
 * Persistent memo of the optimal caption point size per
 * (text, font, box, range) tuple. A hit costs one store read; a miss costs
 * one measurement and one store write.
 */
export function createPointSizeCache(store: PointSizeStore, measurer: TextMeasurer): PointSizeCache {
  const inFlight = new Map<string, InFlightMeasurement>();
  const stats: PointSizeCacheStats = { hits: 0, misses: 0, shared: 0, truncated: 0 };

  async function measureAndStore(key: string, query: PointSizeQuery, signal?: AbortSignal): Promise<number> {
    stats.misses++;

    const measurementQuery = {
      text: query.text,
      font: query.font,
      width: query.boxWidth,
      height: query.boxHeight,
    };
    const raw = await measurer.measure(measurementQuery, signal);
    if (!Number.isInteger(raw) || raw <= 0) {
      throw new MeasurementError('parse', measurementQuery, { detail: `measurer returned ${raw}` });
    }
    const pointSize = clampPointSize(raw, query.minPointSize, query.maxPointSize);

    if (raw < query.minPointSize) {
      stats.truncated++;
      logger.warn(
        { query: describeQuery(query), measured: raw, pointSize },
        'Measured point size below minimum, text will be truncated'
      );
    } else if (raw > query.maxPointSize) {
      logger.debug({ query: describeQuery(query), measured: raw, pointSize }, 'Measured point size capped at maximum');
    }

    store.put(key, pointSize);
    logger.debug({ key, pointSize }, 'Point size cached');
    return pointSize;
  }

  async function resolveQuery(query: PointSizeQuery, signal?: AbortSignal): Promise<number> {
    validateQuery(query);
    const key = pointSizeCacheKey(query);

    const cached = store.get(key);
    if (cached !== undefined) {
      stats.hits++;
      logger.trace({ key, pointSize: cached }, 'Point size cache hit');
      return cached;
    }

    // Only callers under the same abort signal share a running measurement,
    // so one caller aborting never fails another.
    const pending = inFlight.get(key);
    if (pending && pending.signal === signal) {
      stats.shared++;
      return pending.promise;
    }

    const entry: InFlightMeasurement = {
      promise: measureAndStore(key, query, signal).finally(() => {
        if (inFlight.get(key) === entry) inFlight.delete(key);
      }),
      signal,
    };
    if (!pending) inFlight.set(key, entry);
    return entry.promise;
  }

  return {
    resolve: (text, font, boxWidth, boxHeight, minPointSize, maxPointSize, signal) =>
      resolveQuery({ text, font, boxWidth, boxHeight, minPointSize, maxPointSize }, signal),
    resolveQuery,
    getStats: () => ({ ...stats }),
  };
}
