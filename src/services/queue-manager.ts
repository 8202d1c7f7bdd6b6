import * as fs from 'fs/promises';
import * as path from 'path';
import { generateJobId } from '../utils/hash.js';
import { DuplicateJobError, InvalidCatalogIdError, JobNotFoundError, errorMessage } from '../utils/errors.js';
import { isCatalogId, toItemId } from '../utils/item.js';
import { bytesToMb, formatEpisodeCode, sanitizeFilename } from '../utils/text.js';
import { Downloader } from './downloader.js';
import { JobQueue } from './job-queue.js';
import { ProgressTracker } from './progress.js';
import { QueueControl } from './queue-control.js';
import type { RecordStore } from '../db/record-store.js';
import type { FileMatcher } from './file-matcher.js';
import type { CatalogEpisode, CatalogProvider } from '../catalog/base.js';
import type {
  EnqueueRequest,
  EnqueueResult,
  Job,
  MatchTarget,
  ProgressState,
  QueueEntry,
  UnmarkResult,
} from '../types/download.js';

export interface QueueManagerDeps {
  store: RecordStore;
  matcher: FileMatcher;
  provider: CatalogProvider;
}

export interface QueueManagerOptions {
  downloadPath: string;
  chunkSize: number;
  minFileSize: number;
  cooldownMs: number;
  onProgress?: (progress: Readonly<ProgressState>) => void;
}

function episodeTitle(episode: CatalogEpisode): string {
  const code = formatEpisodeCode(episode.season, episode.episode);
  if (episode.title.toUpperCase().includes(code)) {
    return episode.title;
  }
  return [episode.seriesName, code, episode.title].filter(part => part.length > 0).join(' - ');
}

function matchTargetFor(request: EnqueueRequest): MatchTarget | null {
  if (request.kind === 'movie') {
    return request.title ? { kind: 'movie', name: request.title } : null;
  }
  return request.episode ? { kind: 'episode', ...request.episode } : null;
}

/**
 * Owner of the download queue, its control flags and the progress snapshot.
 * Request handlers only go through these methods; the worker is the only
 * other party touching the queue.
 */
export class QueueManager {
  private readonly queue = new JobQueue();
  private readonly control = new QueueControl();
  private readonly progress: ProgressTracker;
  private readonly worker: Downloader;
  private readonly store: RecordStore;
  private readonly matcher: FileMatcher;
  private readonly provider: CatalogProvider;
  private readonly downloadPath: string;

  constructor(deps: QueueManagerDeps, options: QueueManagerOptions) {
    this.store = deps.store;
    this.matcher = deps.matcher;
    this.provider = deps.provider;
    this.downloadPath = options.downloadPath;
    this.progress = new ProgressTracker(options.onProgress);
    this.worker = new Downloader(
      {
        queue: this.queue,
        control: this.control,
        progress: this.progress,
        store: this.store,
        provider: this.provider,
      },
      {
        chunkSize: options.chunkSize,
        minFileSize: options.minFileSize,
        cooldownMs: options.cooldownMs,
      }
    );
  }

  /**
   * Load the download records and index the files already on disk
   */
  async init(): Promise<void> {
    const loaded = await this.store.load();
    const files = await this.matcher.scan();
    if (loaded !== 'loaded') {
      console.log(`[QueueManager] Store ${loaded}, ${files} files on disk will be matched against the catalog`);
    }
  }

  start(): void {
    this.worker.start();
  }

  shutdown(): Promise<void> {
    return this.worker.shutdown();
  }

  // ==================== Queue ====================

  /**
   * Throws InvalidCatalogIdError for an id that is not a plain token
   */
  async enqueue(request: EnqueueRequest): Promise<EnqueueResult> {
    if (!isCatalogId(request.catalogId)) {
      throw new InvalidCatalogIdError(request.catalogId);
    }
    const itemId = toItemId(request.kind, request.catalogId);

    if (await this.checkDownloaded(itemId, matchTargetFor(request))) {
      console.log(`[QueueManager] Already downloaded: ${itemId}`);
      return { status: 'already-downloaded' };
    }

    const job = this.createJob(request, itemId);
    try {
      this.queue.enqueue(job);
    } catch (error) {
      if (error instanceof DuplicateJobError) {
        console.log(`[QueueManager] Already queued: ${itemId}`);
        return { status: 'already-queued' };
      }
      throw error;
    }

    console.log(`[QueueManager] Queued ${job.displayName} (${itemId}), ${this.queue.size()} pending`);
    this.worker.wake();
    return { status: 'queued', jobId: job.id };
  }

  /**
   * Queue every episode of a series, returns how many were added
   */
  async enqueueSeries(seriesId: string): Promise<number> {
    const episodes = await this.provider.getSeriesEpisodes(seriesId);
    let added = 0;

    for (const episode of episodes) {
      if (!isCatalogId(episode.id)) {
        console.warn(`[QueueManager] Skipping episode with invalid id "${episode.id}" in series ${seriesId}`);
        continue;
      }
      const result = await this.enqueue({
        kind: 'series',
        catalogId: episode.id,
        extension: episode.extension,
        title: episodeTitle(episode),
        episode: {
          seriesName: episode.seriesName,
          season: episode.season,
          episode: episode.episode,
        },
      });
      if (result.status === 'queued') {
        added++;
      }
    }

    console.log(`[QueueManager] Series ${seriesId}: ${added}/${episodes.length} episodes queued`);
    return added;
  }

  removeJob(jobId: string): 'removed' | 'not-found' {
    try {
      const job = this.queue.remove(jobId);
      console.log(`[QueueManager] Removed ${job.displayName} from queue`);
      return 'removed';
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        return 'not-found';
      }
      throw error;
    }
  }

  reorder(jobIds: string[]): void {
    this.queue.reorder(jobIds);
  }

  /**
   * Drop every pending job; the one being downloaded keeps going
   */
  clearQueue(): number {
    const cleared = this.queue.clear();
    console.log(`[QueueManager] Cleared ${cleared} pending jobs`);
    this.worker.wake();
    return cleared;
  }

  listQueue(): QueueEntry[] {
    return this.queue.list().map(job => ({
      jobId: job.id,
      displayName: job.displayName,
      kind: job.kind,
      itemId: job.itemId,
    }));
  }

  isQueued(itemId: string): boolean {
    return this.queue.contains(itemId);
  }

  // ==================== Control ====================

  pause(): void {
    this.control.pause();
    console.log('[QueueManager] Pause requested');
    this.worker.wake();
  }

  /**
   * Clears a pause and a stop alike
   */
  resume(): void {
    this.control.resume();
    console.log('[QueueManager] Resume requested');
    this.worker.wake();
  }

  stop(): void {
    this.control.stop();
    console.log('[QueueManager] Stop requested');
    this.worker.wake();
  }

  currentProgress(): ProgressState {
    return { ...this.progress.snapshot(), queueDepth: this.queue.size() };
  }

  // ==================== Downloaded items ====================

  isDownloaded(itemId: string): boolean {
    return this.store.has(itemId);
  }

  /**
   * Store lookup first, then the file index. A file found on disk is
   * recorded so the next lookup is a plain store hit.
   */
  async checkDownloaded(itemId: string, target: MatchTarget | null): Promise<boolean> {
    if (this.store.has(itemId)) return true;
    if (!target) return false;

    const file = this.matcher.match(target);
    if (!file) return false;

    console.log(`[QueueManager] ${itemId} found on disk as ${file.filename}, recording it`);
    const saved = await this.store.record(itemId, file.filename, file.sizeMb);
    if (!saved) {
      console.warn(`[QueueManager] Could not persist on-disk match for ${itemId}`);
    }
    return true;
  }

  async markDownloaded(itemId: string, filename: string, filepath?: string): Promise<boolean> {
    const target = filepath ?? path.join(this.downloadPath, filename);
    let sizeMb = 0;
    try {
      sizeMb = bytesToMb((await fs.stat(target)).size);
    } catch (error) {
      console.warn(`[QueueManager] Size of ${target} unknown: ${errorMessage(error)}`);
    }
    return this.store.record(itemId, filename, sizeMb);
  }

  unmarkDownloaded(itemId: string): Promise<UnmarkResult> {
    return this.store.remove(itemId);
  }

  scanFiles(): Promise<number> {
    return this.matcher.scan();
  }

  private createJob(request: EnqueueRequest, itemId: string): Job {
    const extension = sanitizeFilename(request.extension).replace(/^\.+/, '') || 'mp4';
    // The catalog id keeps names unique when two items share a title
    const title = sanitizeFilename(request.title);
    const filename = `${title ? `${title} [${request.catalogId}]` : request.catalogId}.${extension}`;
    const common = {
      id: generateJobId(itemId),
      itemId,
      url: this.provider.buildStreamUrl(request.kind, request.catalogId, extension),
      destinationPath: path.join(this.downloadPath, filename),
      filename,
      displayName: request.title || filename,
    };

    if (request.kind === 'movie') {
      return { ...common, kind: 'movie' };
    }
    return {
      ...common,
      kind: 'episode',
      seriesName: request.episode?.seriesName ?? null,
      season: request.episode?.season ?? null,
      episode: request.episode?.episode ?? null,
    };
  }
}
