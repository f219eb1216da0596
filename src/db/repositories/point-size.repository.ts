import type Database from 'better-sqlite3';
import { StoreUnavailableError } from '../../lib/errors.js';

export interface PointSizeStore {
  /** Creates the backing table when missing. Safe to call repeatedly. */
  ensureTable(): void;
  get(key: string): number | undefined;
  /** Insert or replace */
  put(key: string, pointSize: number): void;
  getStats(): PointSizeStoreStats;
}

export interface PointSizeStoreStats {
  entries: number;
  sizeBytes: number;
}

interface PointSizeRow {
  PointSize: number;
}

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS PointSizeCache (
    CacheKey TEXT PRIMARY KEY,
    PointSize INTEGER NOT NULL
  )
`;

function storeFailure(action: string, db: Database.Database, error: unknown): StoreUnavailableError {
  return new StoreUnavailableError(`Point-size store ${action} failed`, {
    path: db.name,
    cause: error,
  });
}

interface PreparedStatements {
  select: Database.Statement<[string], PointSizeRow>;
  upsert: Database.Statement<[string, number]>;
}

export function createPointSizeRepository(db: Database.Database): PointSizeStore {
  // Prepared only once the table exists, since preparing against a missing table throws.
  let statements: PreparedStatements | null = null;

  function prepared(): PreparedStatements {
    if (statements) return statements;
    let created: PreparedStatements;
    try {
      db.exec(CREATE_TABLE_SQL);
      created = {
        select: db.prepare<[string], PointSizeRow>(
          'SELECT PointSize FROM PointSizeCache WHERE CacheKey = ?'
        ),
        upsert: db.prepare<[string, number]>(`
          INSERT INTO PointSizeCache (CacheKey, PointSize) VALUES (?, ?)
          ON CONFLICT(CacheKey) DO UPDATE SET PointSize = excluded.PointSize
        `),
      };
    } catch (error) {
      throw storeFailure('table creation', db, error);
    }
    statements = created;
    return created;
  }

  function ensureTable(): void {
    prepared();
  }

  function get(key: string): number | undefined {
    const { select } = prepared();
    try {
      return select.get(key)?.PointSize;
    } catch (error) {
      throw storeFailure('read', db, error);
    }
  }

  function put(key: string, pointSize: number): void {
    if (!Number.isInteger(pointSize)) {
      throw new TypeError(`Point size must be an integer, got ${pointSize}`);
    }
    const { upsert } = prepared();
    try {
      upsert.run(key, pointSize);
    } catch (error) {
      throw storeFailure('write', db, error);
    }
  }

  function getStats(): PointSizeStoreStats {
    prepared();
    try {
      const entries = db
        .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM PointSizeCache')
        .get()?.count ?? 0;
      const pageCount = Number(db.pragma('page_count', { simple: true }));
      const pageSize = Number(db.pragma('page_size', { simple: true }));
      return { entries, sizeBytes: pageCount * pageSize };
    } catch (error) {
      throw storeFailure('stats query', db, error);
    }
  }

  return { ensureTable, get, put, getStats };
}
