import { createHash } from 'node:crypto';

export interface PointSizeQuery {
  text: string;
  font: string;
  boxWidth: number;
  boxHeight: number;
  minPointSize: number;
  maxPointSize: number;
}

/**
 * Stable cache key for a point-size query.
 *
 * The tuple is JSON-encoded in a fixed field order before hashing, so field
 * values may contain any character (including `-`) without two different
 * tuples ever sharing an encoding.
 */
export function pointSizeCacheKey(query: PointSizeQuery): string {
  const canonical = JSON.stringify([
    query.text,
    query.font,
    query.boxWidth,
    query.boxHeight,
    query.minPointSize,
    query.maxPointSize,
  ]);
  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

/** Human-readable form of a query for log lines and error messages */
export function describeQuery(query: PointSizeQuery): string {
  return `"${query.text}" ${query.font} ${query.boxWidth}x${query.boxHeight} [${query.minPointSize}-${query.maxPointSize}]`;
}
