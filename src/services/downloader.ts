import * as fs from 'fs/promises';
import * as path from 'path';
import { PARTIAL_SUFFIX, bytesToMb } from '../utils/text.js';
import { errorMessage } from '../utils/errors.js';
import { Signal, delay } from '../utils/signal.js';
import { rechunk } from '../utils/stream.js';
import type { JobQueue } from './job-queue.js';
import type { QueueControl } from './queue-control.js';
import type { ProgressTracker } from './progress.js';
import type { RecordStore } from '../db/record-store.js';
import type { CatalogProvider } from '../catalog/base.js';
import type { DownloadStatus, Job } from '../types/download.js';

export interface DownloaderOptions {
  chunkSize: number;    // bytes written per step, pause/stop are checked between steps
  minFileSize: number;  // finished files at or below this size are not recorded
  cooldownMs: number;   // how long 'complete' / 'error' stay visible before the next job
}

export interface DownloaderDeps {
  queue: JobQueue;
  control: QueueControl;
  progress: ProgressTracker;
  store: RecordStore;
  provider: CatalogProvider;
}

type TransferOutcome = 'completed' | 'aborted';

/**
 * The single consumer of the job queue.
 *
 * The loop sleeps on a wake-up signal while stopped, paused or out of work;
 * the queue manager raises it on every enqueue and control command. Bytes go to
 * `<destination>.part`, renamed to the destination only once the body has been
 * fully written. A stop takes effect before the next chunk write and leaves the
 * `.part` file in place.
 */
export class Downloader {
  private running = false;
  private loop: Promise<void> | null = null;
  private readonly wakeup = new Signal();
  private readonly queue: JobQueue;
  private readonly control: QueueControl;
  private readonly progress: ProgressTracker;
  private readonly store: RecordStore;
  private readonly provider: CatalogProvider;

  constructor(deps: DownloaderDeps, private readonly options: DownloaderOptions) {
    this.queue = deps.queue;
    this.control = deps.control;
    this.progress = deps.progress;
    this.store = deps.store;
    this.provider = deps.provider;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run().catch(error => {
      this.running = false;
      console.error('[Downloader] Worker crashed:', error);
    });
    console.log('[Downloader] Worker started');
  }

  /**
   * End the loop. A transfer in progress is abandoned at its next chunk, like a stop.
   */
  async shutdown(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.wakeup.notify();
    await this.loop;
    this.loop = null;
    console.log('[Downloader] Worker stopped');
  }

  wake(): void {
    this.wakeup.notify();
  }

  private async run(): Promise<void> {
    while (this.running) {
      if (this.control.isStopped()) {
        this.showWaiting('stopped');
        await this.wakeup.wait();
        continue;
      }
      if (this.control.isPaused()) {
        this.showWaiting('paused');
        await this.wakeup.wait();
        continue;
      }

      const job = this.queue.tryDequeue();
      if (!job) {
        this.showWaiting('idle');
        await this.wakeup.wait();
        continue;
      }

      await this.process(job);
    }
  }

  private showWaiting(status: DownloadStatus): void {
    const current = this.progress.snapshot();
    const queueDepth = this.queue.size();
    if (current.status !== status || current.queueDepth !== queueDepth) {
      this.progress.update({ status, queueDepth });
    }
  }

  private async process(job: Job): Promise<void> {
    this.progress.update({
      currentFile: job.filename,
      bytesDownloaded: 0,
      totalBytes: null,
      percent: 0,
      status: 'starting',
      queueDepth: this.queue.size(),
      errorMessage: null,
    });
    console.log(`[Downloader] Starting ${job.displayName} -> ${job.destinationPath}`);

    try {
      const outcome = await this.transfer(job);
      if (outcome === 'aborted') {
        console.log(`[Downloader] Stopped ${job.displayName}, partial file kept: ${job.destinationPath}${PARTIAL_SUFFIX}`);
        return;
      }
      await this.finish(job);
      await delay(this.options.cooldownMs);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Downloader] Failed ${job.displayName}: ${message}`);
      this.progress.update({ status: 'error', errorMessage: message });
      await delay(this.options.cooldownMs);
    } finally {
      this.progress.update({ percent: 0, queueDepth: this.queue.size() });
    }
  }

  private async transfer(job: Job): Promise<TransferOutcome> {
    const stream = await this.provider.openStream(job.url);
    const total = stream.totalBytes;
    const partialPath = `${job.destinationPath}${PARTIAL_SUFFIX}`;
    let file: fs.FileHandle | null = null;
    let downloaded = 0;

    try {
      await fs.mkdir(path.dirname(job.destinationPath), { recursive: true });
      // The .part name is unique to the item, so a leftover from an earlier attempt is replaced
      file = await fs.open(partialPath, 'w');

      for await (const chunk of rechunk(stream.body, this.options.chunkSize)) {
        if (!(await this.checkpoint())) {
          return 'aborted';
        }
        await file.write(chunk);
        downloaded += chunk.length;
        this.progress.update({
          bytesDownloaded: downloaded,
          totalBytes: total,
          status: 'downloading',
          ...(total ? { percent: Math.min(100, Math.floor((downloaded / total) * 100)) } : {}),
        });
      }
      await file.close();
      file = null;
      await fs.rename(partialPath, job.destinationPath);
      return 'completed';
    } finally {
      stream.close();
      await file?.close();
    }
  }

  /**
   * Block while paused. Returns false when the transfer must be abandoned.
   */
  private async checkpoint(): Promise<boolean> {
    while (this.running && this.control.isPaused()) {
      if (this.progress.snapshot().status !== 'paused') {
        this.progress.update({ status: 'paused' });
        console.log('[Downloader] Paused');
      }
      await this.wakeup.wait();
    }
    return this.running && !this.control.isStopped();
  }

  private async finish(job: Job): Promise<void> {
    let size = 0;
    try {
      size = (await fs.stat(job.destinationPath)).size;
    } catch (error) {
      console.error(`[Downloader] Finished file missing: ${job.destinationPath} (${errorMessage(error)})`);
    }

    if (size > this.options.minFileSize) {
      const saved = await this.store.record(job.itemId, job.filename, bytesToMb(size));
      if (!saved) {
        console.error(`[Downloader] Could not record ${job.itemId} as downloaded`);
      }
    } else {
      console.warn(`[Downloader] ${job.filename} is only ${size} bytes, not recording it`);
    }

    this.progress.update({ status: 'complete', percent: 100 });
    console.log(`[Downloader] Completed ${job.displayName}`);
  }
}
