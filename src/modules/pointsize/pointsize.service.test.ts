import Database from 'better-sqlite3';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { closeDatabase, openDatabase } from '../../db/index.js';
import { createPointSizeRepository, type PointSizeStore } from '../../db/repositories/point-size.repository.js';
import { pointSizeCacheKey } from '../../lib/cache-key.js';
import { MeasurementError, ValidationError } from '../../lib/errors.js';
import type { TextMeasurer } from './pointsize.measurer.js';
import { clampPointSize, createPointSizeCache } from './pointsize.service.js';

function fakeMeasurer(result: number | TextMeasurer['measure']) {
  if (typeof result === 'number') {
    const size = result;
    return { measure: vi.fn<TextMeasurer['measure']>(async () => size) };
  }
  return { measure: vi.fn<TextMeasurer['measure']>(result) };
}

describe('clampPointSize', () => {
  it.each([
    [312, 250],
    [42, 100],
    [100, 100],
    [250, 250],
    [180, 180],
  ] as const)('clamps %i into [100, 250] as %i', (raw, expected) => {
    expect(clampPointSize(raw, 100, 250)).toBe(expected);
  });
});

describe('createPointSizeCache', () => {
  let db: Database.Database;
  let store: PointSizeStore;

  beforeEach(() => {
    db = new Database(':memory:');
    store = createPointSizeRepository(db);
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it('measures once, clamps to the maximum and serves the repeat from the store', async () => {
    const measurer = fakeMeasurer(312);
    const cache = createPointSizeCache(store, measurer);

    const first = await cache.resolve('ENGLISH', 'ComfortAa-Medium', 1800, 1000, 100, 250);
    const second = await cache.resolve('ENGLISH', 'ComfortAa-Medium', 1800, 1000, 100, 250);

    expect(first).toBe(250);
    expect(second).toBe(250);
    expect(measurer.measure).toHaveBeenCalledTimes(1);
    expect(measurer.measure).toHaveBeenCalledWith(
      { text: 'ENGLISH', font: 'ComfortAa-Medium', width: 1800, height: 1000 },
      undefined
    );
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, shared: 0, truncated: 0 });
  });

  it('stores the clamped value under the tuple key', async () => {
    const cache = createPointSizeCache(store, fakeMeasurer(312));

    await cache.resolve('ENGLISH', 'ComfortAa-Medium', 1800, 1000, 100, 250);

    const key = pointSizeCacheKey({
      text: 'ENGLISH',
      font: 'ComfortAa-Medium',
      boxWidth: 1800,
      boxHeight: 1000,
      minPointSize: 100,
      maxPointSize: 250,
    });
    expect(store.get(key)).toBe(250);
  });

  it('raises small measurements to the minimum and counts them as truncated', async () => {
    const cache = createPointSizeCache(store, fakeMeasurer(42));

    const size = await cache.resolve('A VERY LONG CATEGORY NAME', 'ComfortAa-Medium', 1800, 1000, 100, 250);

    expect(size).toBe(100);
    expect(cache.getStats().truncated).toBe(1);
  });

  it('returns in-range measurements unchanged', async () => {
    const cache = createPointSizeCache(store, fakeMeasurer(173));

    expect(await cache.resolve('DECADE', 'ComfortAa-Medium', 1800, 1000, 100, 250)).toBe(173);
  });

  it('performs one read and one write on a miss, one read and no write on a hit', async () => {
    const getSpy = vi.spyOn(store, 'get');
    const putSpy = vi.spyOn(store, 'put');
    const measurer = fakeMeasurer(200);
    const cache = createPointSizeCache(store, measurer);

    await cache.resolve('HDR', 'ComfortAa-Medium', 1800, 1000, 120, 400);
    expect(getSpy).toHaveBeenCalledTimes(1);
    expect(putSpy).toHaveBeenCalledTimes(1);

    await cache.resolve('HDR', 'ComfortAa-Medium', 1800, 1000, 120, 400);
    expect(getSpy).toHaveBeenCalledTimes(2);
    expect(putSpy).toHaveBeenCalledTimes(1);
    expect(measurer.measure).toHaveBeenCalledTimes(1);
  });

  it('treats a different range as a different query', async () => {
    const measurer = fakeMeasurer(312);
    const cache = createPointSizeCache(store, measurer);

    expect(await cache.resolve('ENGLISH', 'ComfortAa-Medium', 1800, 1000, 100, 250)).toBe(250);
    expect(await cache.resolve('ENGLISH', 'ComfortAa-Medium', 1800, 1000, 100, 300)).toBe(300);
    expect(measurer.measure).toHaveBeenCalledTimes(2);
  });

  it('propagates measurement failures and caches nothing', async () => {
    const failure = new MeasurementError('exit', {
      text: 'ENGLISH',
      font: 'Missing-Font',
      width: 1800,
      height: 1000,
    });
    const measurer = fakeMeasurer(async () => {
      throw failure;
    });
    const putSpy = vi.spyOn(store, 'put');
    const cache = createPointSizeCache(store, measurer);

    await expect(cache.resolve('ENGLISH', 'Missing-Font', 1800, 1000, 100, 250)).rejects.toBe(failure);
    expect(putSpy).not.toHaveBeenCalled();

    await expect(cache.resolve('ENGLISH', 'Missing-Font', 1800, 1000, 100, 250)).rejects.toBe(failure);
    expect(measurer.measure).toHaveBeenCalledTimes(2);
  });

  it.each([Number.NaN, 0, -5, 12.5])('rejects a measurer result of %s without caching it', async (raw) => {
    const putSpy = vi.spyOn(store, 'put');
    const cache = createPointSizeCache(store, fakeMeasurer(raw));

    await expect(cache.resolve('ENGLISH', 'ComfortAa-Medium', 1800, 1000, 100, 250)).rejects.toBeInstanceOf(
      MeasurementError
    );
    expect(putSpy).not.toHaveBeenCalled();
  });

  it.each([
    ['an inverted range', [1800, 1000, 250, 100]],
    ['a zero minimum', [1800, 1000, 0, 100]],
    ['a fractional box', [1800.5, 1000, 100, 250]],
    ['a negative box', [1800, -1, 100, 250]],
  ] as const)('rejects %s before touching the store', async (_label, [w, h, min, max]) => {
    const getSpy = vi.spyOn(store, 'get');
    const measurer = fakeMeasurer(200);
    const cache = createPointSizeCache(store, measurer);

    await expect(cache.resolve('ENGLISH', 'ComfortAa-Medium', w, h, min, max)).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(getSpy).not.toHaveBeenCalled();
    expect(measurer.measure).not.toHaveBeenCalled();
  });

  it('shares one measurement between concurrent identical queries', async () => {
    let release: (value: number) => void = () => undefined;
    const measurer = fakeMeasurer(
      () =>
        new Promise<number>((resolve) => {
          release = resolve;
        })
    );
    const cache = createPointSizeCache(store, measurer);

    const first = cache.resolve('FRENCH', 'ComfortAa-Medium', 1800, 1000, 100, 250);
    const second = cache.resolve('FRENCH', 'ComfortAa-Medium', 1800, 1000, 100, 250);
    release(190);

    expect(await Promise.all([first, second])).toEqual([190, 190]);
    expect(measurer.measure).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toEqual({ hits: 0, misses: 1, shared: 1, truncated: 0 });
  });

  it('shares a measurement between callers under the same abort signal', async () => {
    let release: (value: number) => void = () => undefined;
    const measurer = fakeMeasurer(
      () =>
        new Promise<number>((resolve) => {
          release = resolve;
        })
    );
    const cache = createPointSizeCache(store, measurer);
    const controller = new AbortController();

    const first = cache.resolve('SPANISH', 'ComfortAa-Medium', 1800, 1000, 100, 250, controller.signal);
    const second = cache.resolve('SPANISH', 'ComfortAa-Medium', 1800, 1000, 100, 250, controller.signal);
    release(210);

    expect(await Promise.all([first, second])).toEqual([210, 210]);
    expect(measurer.measure).toHaveBeenCalledTimes(1);
  });

  it('does not fail a concurrent caller when another caller aborts', async () => {
    const releases: Array<(value: number) => void> = [];
    const measurer = fakeMeasurer(
      (query, signal) =>
        new Promise<number>((resolve, reject) => {
          releases.push(resolve);
          signal?.addEventListener('abort', () => reject(new MeasurementError('aborted', query)));
        })
    );
    const cache = createPointSizeCache(store, measurer);
    const controller = new AbortController();

    const aborted = cache.resolve('FRENCH', 'ComfortAa-Medium', 1800, 1000, 100, 250, controller.signal);
    const unaffected = cache.resolve('FRENCH', 'ComfortAa-Medium', 1800, 1000, 100, 250);
    controller.abort();

    await expect(aborted).rejects.toMatchObject({ reason: 'aborted' });
    for (const release of releases) release(200);
    expect(await unaffected).toBe(200);
    expect(measurer.measure).toHaveBeenCalledTimes(2);
    expect(cache.getStats()).toEqual({ hits: 0, misses: 2, shared: 0, truncated: 0 });
  });

  it('passes the abort signal to the measurer', async () => {
    const measurer = fakeMeasurer(150);
    const cache = createPointSizeCache(store, measurer);
    const controller = new AbortController();

    await cache.resolve('ITALIAN', 'ComfortAa-Medium', 1800, 1000, 100, 250, controller.signal);

    expect(measurer.measure).toHaveBeenCalledWith(expect.anything(), controller.signal);
  });
});

describe('point-size cache with a file-backed store', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'poster-batch-cache-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the store on first use and survives a reopen', async () => {
    const dbPath = join(dir, 'pointsize.db');
    expect(existsSync(dbPath)).toBe(false);

    const firstDb = openDatabase(dbPath);
    const firstMeasurer = fakeMeasurer(312);
    const first = await createPointSizeCache(createPointSizeRepository(firstDb), firstMeasurer).resolve(
      'ENGLISH',
      'ComfortAa-Medium',
      1800,
      1000,
      100,
      250
    );
    closeDatabase(firstDb);

    const secondDb = openDatabase(dbPath);
    const secondMeasurer = fakeMeasurer(999);
    const second = await createPointSizeCache(createPointSizeRepository(secondDb), secondMeasurer).resolve(
      'ENGLISH',
      'ComfortAa-Medium',
      1800,
      1000,
      100,
      250
    );
    closeDatabase(secondDb);

    expect(existsSync(dbPath)).toBe(true);
    expect(first).toBe(250);
    expect(second).toBe(250);
    expect(firstMeasurer.measure).toHaveBeenCalledTimes(1);
    expect(secondMeasurer.measure).not.toHaveBeenCalled();
  });
});
