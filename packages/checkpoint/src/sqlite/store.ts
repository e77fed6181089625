import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import BetterSqlite3 from 'better-sqlite3';
import { CheckpointError, DEFAULT_LOOKBACK_DAYS } from '@diffwatch/shared';
import type { CheckpointStore, CheckpointStoreOptions, ScanIdentity, ScanRecord } from '../types';

type SQLiteDatabase = InstanceType<typeof BetterSqlite3>;

interface ScanRow {
  id: number;
  scan_date: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const EPOCH = new Date(0);

/**
 * One table per identity. The name is `<repository>@<branch>`; the `@` keeps
 * `ab`+`c` and `a`+`bc` apart.
 */
export function tableNameFor(identity: ScanIdentity): string {
  return `${identity.repository}@${identity.branch}`;
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function parseScanDate(row: ScanRow, table: string): Date {
  const date = new Date(row.scan_date);
  if (Number.isNaN(date.getTime())) {
    throw new CheckpointError(`Corrupt checkpoint row ${row.id} in ${table}: "${row.scan_date}"`);
  }
  return date;
}

export function createCheckpointStore(): CheckpointStore {
  let db: SQLiteDatabase | null = null;
  let lookbackDays = DEFAULT_LOOKBACK_DAYS;
  let now: () => Date = () => new Date();
  const knownTables = new Set<string>();

  const getDb = (): SQLiteDatabase => {
    if (!db) throw new CheckpointError('Checkpoint database not initialized. Call init() first.');
    return db;
  };

  const ensureTable = (identity: ScanIdentity): string => {
    const table = quoteIdentifier(tableNameFor(identity));
    if (knownTables.has(table)) return table;
    getDb().exec(`
      CREATE TABLE IF NOT EXISTS ${table} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        scan_date TEXT NOT NULL
      )
    `);
    knownTables.add(table);
    return table;
  };

  const init = (options: CheckpointStoreOptions): void => {
    lookbackDays = options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
    if (options.now) now = options.now;

    try {
      mkdirSync(dirname(options.dbPath), { recursive: true });
      db = new BetterSqlite3(options.dbPath);
      db.pragma('journal_mode = WAL');
    } catch (error) {
      throw new CheckpointError(`Failed to open checkpoint database at ${options.dbPath}`, {
        cause: error,
      });
    }
  };

  const close = (): void => {
    if (db) {
      db.close();
      db = null;
      knownTables.clear();
    }
  };

  const getLastScan = (identity: ScanIdentity, isFreshMirror: boolean): Date => {
    if (isFreshMirror) {
      return new Date(now().getTime() - lookbackDays * DAY_MS);
    }

    let row: ScanRow | undefined;
    try {
      const table = ensureTable(identity);
      row = getDb()
        .prepare<[], ScanRow>(`SELECT id, scan_date FROM ${table} ORDER BY id DESC LIMIT 1`)
        .get();
    } catch (error) {
      if (error instanceof CheckpointError) throw error;
      throw new CheckpointError(`Failed to read checkpoint for ${tableNameFor(identity)}`, {
        cause: error,
      });
    }

    return row ? parseScanDate(row, tableNameFor(identity)) : EPOCH;
  };

  const recordScan = (identity: ScanIdentity, timestamp: Date): void => {
    if (Number.isNaN(timestamp.getTime())) {
      throw new CheckpointError(`Refusing to record an invalid timestamp for ${tableNameFor(identity)}`);
    }
    try {
      const table = ensureTable(identity);
      getDb()
        .prepare<[string]>(`INSERT INTO ${table} (scan_date) VALUES (?)`)
        .run(timestamp.toISOString());
    } catch (error) {
      if (error instanceof CheckpointError) throw error;
      throw new CheckpointError(`Failed to record checkpoint for ${tableNameFor(identity)}`, {
        cause: error,
      });
    }
  };

  const listScans = (identity: ScanIdentity, limit = 20): ScanRecord[] => {
    try {
      const table = ensureTable(identity);
      const rows = getDb()
        .prepare<[number], ScanRow>(`SELECT id, scan_date FROM ${table} ORDER BY id DESC LIMIT ?`)
        .all(limit);
      return rows.map((row) => ({ id: row.id, scannedAt: parseScanDate(row, tableNameFor(identity)) }));
    } catch (error) {
      if (error instanceof CheckpointError) throw error;
      throw new CheckpointError(`Failed to list checkpoints for ${tableNameFor(identity)}`, {
        cause: error,
      });
    }
  };

  return { init, getLastScan, recordScan, listScans, close };
}
