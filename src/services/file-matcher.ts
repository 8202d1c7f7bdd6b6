import * as fs from 'fs/promises';
import * as path from 'path';
import { errorMessage, isErrnoException } from '../utils/errors.js';
import {
  DEFAULT_MOVIE_TOLERANCE,
  bytesToMb,
  isPartialFile,
  matchesTarget,
  normalizeFilename,
  parseFilename,
} from '../utils/text.js';
import type { MatchTarget, ScannedFileRecord } from '../types/download.js';

export interface FileMatcherOptions {
  minFileSize: number;      // bytes, smaller files are not indexed
  movieTolerance?: number;
}

/**
 * Index of the media files already in the download directory.
 * Each scan rebuilds the index from scratch; matching never touches the disk.
 */
export class FileMatcher {
  private index = new Map<string, ScannedFileRecord>();
  private readonly minFileSize: number;
  private readonly movieTolerance: number;

  constructor(
    readonly directory: string,
    options: FileMatcherOptions
  ) {
    this.minFileSize = options.minFileSize;
    this.movieTolerance = options.movieTolerance ?? DEFAULT_MOVIE_TOLERANCE;
  }

  /**
   * Scan regular files above the size floor, returns how many were indexed.
   * Unfinished transfers (`.part`) are never indexed.
   */
  async scan(directory: string = this.directory): Promise<number> {
    const next = new Map<string, ScannedFileRecord>();
    const scannedAt = Math.floor(Date.now() / 1000);

    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        console.warn(`[FileMatcher] Directory not found: ${directory}`);
      } else {
        console.error(`[FileMatcher] Cannot list ${directory}: ${errorMessage(error)}`);
      }
      this.index = next;
      return 0;
    }

    for (const filename of entries) {
      if (isPartialFile(filename)) continue;

      let size: number;
      try {
        const stats = await fs.stat(path.join(directory, filename));
        if (!stats.isFile()) continue;
        size = stats.size;
      } catch (error) {
        // Removed between readdir and stat
        console.warn(`[FileMatcher] Skipping ${filename}: ${errorMessage(error)}`);
        continue;
      }
      if (size <= this.minFileSize) continue;

      const normalizedKey = normalizeFilename(filename);
      next.set(normalizedKey, {
        normalizedKey,
        filename,
        sizeMb: bytesToMb(size),
        scannedAt,
        parsed: parseFilename(filename),
      });
    }

    this.index = next;
    console.log(`[FileMatcher] Indexed ${next.size} files in ${directory}`);
    return next.size;
  }

  /**
   * First indexed file matching the catalog item, or null
   */
  match(target: MatchTarget): ScannedFileRecord | null {
    for (const record of this.index.values()) {
      if (matchesTarget(record.parsed, target, this.movieTolerance)) {
        return record;
      }
    }
    return null;
  }

  entries(): ScannedFileRecord[] {
    return [...this.index.values()];
  }

  size(): number {
    return this.index.size;
  }
}
