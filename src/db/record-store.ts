import * as fs from 'fs/promises';
import { errorMessage, isErrnoException } from '../utils/errors.js';
import type { DownloadRecord, UnmarkResult } from '../types/download.js';

// On-disk shape, keyed by item id
interface StoredRecord {
  downloaded_at: number;
  filename: string;
  size_mb: number;
}

export type LoadResult =
  | 'loaded'      // File read and parsed
  | 'missing'     // No file yet, starting empty
  | 'recovered'   // File was corrupt, moved aside to <file>.backup
  | 'unreadable'; // File exists but could not be read; moved aside, or writes stay refused

function isStoredRecord(value: unknown): value is StoredRecord {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return typeof record.downloaded_at === 'number'
    && typeof record.filename === 'string'
    && typeof record.size_mb === 'number';
}

function parseRecords(raw: string): Map<string, DownloadRecord> {
  const data: unknown = JSON.parse(raw);
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Expected an object keyed by item id');
  }

  const records = new Map<string, DownloadRecord>();
  for (const [itemId, value] of Object.entries(data)) {
    if (!isStoredRecord(value)) {
      throw new Error(`Malformed record for ${itemId}`);
    }
    records.set(itemId, {
      itemId,
      downloadedAt: value.downloaded_at,
      filename: value.filename,
      sizeMb: value.size_mb,
    });
  }
  return records;
}

function serializeRecords(records: Map<string, DownloadRecord>): string {
  const data: Record<string, StoredRecord> = {};
  for (const record of records.values()) {
    data[record.itemId] = {
      downloaded_at: record.downloadedAt,
      filename: record.filename,
      size_mb: record.sizeMb,
    };
  }
  return JSON.stringify(data, null, 2);
}

/**
 * Completed downloads, kept in memory and mirrored to a JSON file.
 *
 * Writes go to a temp file in the same directory and are renamed over the
 * target, so the file on disk is always a complete snapshot. `record` and
 * `remove` only change the in-memory map once their write succeeded, and
 * writes are serialized so two of them never race on the rename.
 */
export class RecordStore {
  private records = new Map<string, DownloadRecord>();
  private writeLock: Promise<void> = Promise.resolve();
  private tempCounter = 0;
  // Set when an unreadable store could not be moved aside; saving would overwrite it
  private writeBlocked = false;

  constructor(readonly filePath: string) {}

  async load(): Promise<LoadResult> {
    let raw: string;
    this.writeBlocked = false;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      this.records = new Map();
      if (isErrnoException(error) && error.code === 'ENOENT') {
        console.log(`[RecordStore] No store at ${this.filePath}, starting empty`);
        return 'missing';
      }
      console.error(`[RecordStore] Cannot read ${this.filePath}: ${errorMessage(error)}`);
      this.writeBlocked = !(await this.moveAside());
      return 'unreadable';
    }

    try {
      this.records = parseRecords(raw);
      console.log(`[RecordStore] Loaded ${this.records.size} records`);
      return 'loaded';
    } catch (error) {
      console.warn(`[RecordStore] Corrupt store (${errorMessage(error)}), starting empty`);
      this.records = new Map();
      this.writeBlocked = !(await this.moveAside());
      return 'recovered';
    }
  }

  /**
   * Persist the current records. Returns false if the write failed.
   */
  save(): Promise<boolean> {
    return this.exclusive(() => this.write(this.records));
  }

  /**
   * Upsert a record stamped with the current time, then persist
   */
  record(itemId: string, filename: string, sizeMb: number): Promise<boolean> {
    return this.exclusive(async () => {
      const next = new Map(this.records);
      next.set(itemId, {
        itemId,
        downloadedAt: Math.floor(Date.now() / 1000),
        filename,
        sizeMb,
      });

      const saved = await this.write(next);
      if (saved) {
        this.records = next;
        console.log(`[RecordStore] Recorded ${itemId} (${filename}, ${sizeMb} MB)`);
      }
      return saved;
    });
  }

  remove(itemId: string): Promise<UnmarkResult> {
    return this.exclusive(async () => {
      if (!this.records.has(itemId)) {
        return 'not-found';
      }

      const next = new Map(this.records);
      next.delete(itemId);
      if (!(await this.write(next))) {
        return 'save-failed';
      }
      this.records = next;
      console.log(`[RecordStore] Removed ${itemId}`);
      return 'removed';
    });
  }

  has(itemId: string): boolean {
    return this.records.has(itemId);
  }

  get(itemId: string): DownloadRecord | null {
    return this.records.get(itemId) ?? null;
  }

  all(): DownloadRecord[] {
    return [...this.records.values()];
  }

  size(): number {
    return this.records.size;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeLock.then(task);
    this.writeLock = run.then(() => undefined, () => undefined);
    return run;
  }

  private async write(records: Map<string, DownloadRecord>): Promise<boolean> {
    if (this.writeBlocked) {
      console.error(`[RecordStore] Not saving: ${this.filePath} could not be read or backed up`);
      return false;
    }
    const tempPath = `${this.filePath}.${process.pid}.${++this.tempCounter}.tmp`;

    try {
      const handle = await fs.open(tempPath, 'w');
      try {
        await handle.writeFile(serializeRecords(records), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, this.filePath);
      return true;
    } catch (error) {
      console.error(`[RecordStore] Failed to save ${this.filePath}: ${errorMessage(error)}`);
      await this.removeTemp(tempPath);
      return false;
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      console.warn(`[RecordStore] Could not remove temp file ${tempPath}: ${errorMessage(error)}`);
    }
  }

  private async moveAside(): Promise<boolean> {
    const backupPath = `${this.filePath}.backup`;
    try {
      await fs.rename(this.filePath, backupPath);
      console.warn(`[RecordStore] Store moved to ${backupPath}`);
      return true;
    } catch (error) {
      console.error(`[RecordStore] Could not back up store: ${errorMessage(error)}`);
      return false;
    }
  }
}
