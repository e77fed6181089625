/**
 * Identifies one watched branch of one repository.
 * Each identity owns its own append-only scan log.
 */
export interface ScanIdentity {
  /** Repository name derived from its URL */
  repository: string;
  branch: string;
}

/**
 * One row of the scan log.
 */
export interface ScanRecord {
  /** Ordinal used only for ordering; the latest row has the highest id */
  id: number;
  scannedAt: Date;
}

export interface CheckpointStoreOptions {
  dbPath: string;
  /** Scan window returned for a freshly cloned mirror. Default: 10 days */
  lookbackDays?: number;
  /** Clock used for the fresh-mirror window */
  now?: () => Date;
}

export interface CheckpointStore {
  init(options: CheckpointStoreOptions): void;
  /**
   * Returns the timestamp the next harvest starts from.
   * A fresh mirror always gets `now - lookbackDays`; otherwise the latest recorded
   * scan, or the epoch when the identity has never been scanned.
   */
  getLastScan(identity: ScanIdentity, isFreshMirror: boolean): Date;
  /** Appends a scan row. Throws CheckpointError on any write failure. */
  recordScan(identity: ScanIdentity, timestamp: Date): void;
  /** Newest-first scan history */
  listScans(identity: ScanIdentity, limit?: number): ScanRecord[];
  close(): void;
}
