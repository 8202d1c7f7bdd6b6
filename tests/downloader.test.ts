import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { RecordStore } from '../src/db/record-store.js';
import { FileMatcher } from '../src/services/file-matcher.js';
import { QueueManager } from '../src/services/queue-manager.js';
import { delay } from '../src/utils/signal.js';
import { FakeProvider, MiB, makeTempDir } from './helpers.js';
import type { ProgressState } from '../src/types/download.js';

describe('download worker', () => {
  let root: string;
  let downloads: string;
  let provider: FakeProvider;
  let store: RecordStore;
  let manager: QueueManager;
  let updates: ProgressState[];
  let onUpdate: (progress: ProgressState) => void;

  const movieUrl = (id: string) => `http://catalog.test/movie/${id}.mkv`;
  const enqueueMovie = (id: string, title: string) =>
    manager.enqueue({ kind: 'movie', catalogId: id, extension: 'mkv', title });
  const statuses = () => updates.map(update => update.status);

  beforeEach(async () => {
    let storeFile: string;
    ({ root, downloads, storeFile } = await makeTempDir());
    provider = new FakeProvider();
    store = new RecordStore(storeFile);
    updates = [];
    onUpdate = () => {};

    manager = new QueueManager(
      { store, matcher: new FileMatcher(downloads, { minFileSize: MiB }), provider },
      {
        downloadPath: downloads,
        chunkSize: MiB,
        minFileSize: MiB,
        cooldownMs: 0,
        onProgress: progress => {
          updates.push(progress);
          onUpdate(progress);
        },
      }
    );
    await manager.init();
    manager.start();
  });

  afterEach(async () => {
    await manager.shutdown();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('downloads a job and records it', async () => {
    provider.serve(movieUrl('42'), 10 * MiB);

    await enqueueMovie('42', 'Big Movie');
    await expect.poll(() => manager.isDownloaded('movie:42')).toBe(true);
    await expect.poll(() => manager.currentProgress().status).toBe('idle');

    expect(updates.filter(u => u.status === 'downloading').map(u => u.percent))
      .toEqual([10, 20, 30, 40, 50, 60, 70, 80, 90, 100]);
    expect(statuses()).toContain('complete');
    expect(store.get('movie:42')).toMatchObject({ filename: 'Big Movie [42].mkv', sizeMb: 10 });
    expect(await fs.readdir(downloads)).toEqual(['Big Movie [42].mkv']);
    expect((await fs.stat(path.join(downloads, 'Big Movie [42].mkv'))).size).toBe(10 * MiB);
    expect(provider.closed).toEqual([movieUrl('42')]);
  });

  it('re-slices the body into fixed-size writes', async () => {
    provider.serve(movieUrl('5'), 3 * MiB + 512, { chunkSize: 300 * 1024 });

    await enqueueMovie('5', 'Odd Sizes');
    await expect.poll(() => manager.isDownloaded('movie:5')).toBe(true);

    expect(updates.filter(u => u.status === 'downloading').map(u => u.bytesDownloaded))
      .toEqual([MiB, 2 * MiB, 3 * MiB, 3 * MiB + 512]);
  });

  it('keeps percent at zero when the size is not advertised', async () => {
    provider.serve(movieUrl('7'), 3 * MiB, { advertise: false });

    await enqueueMovie('7', 'No Length');
    await expect.poll(() => manager.isDownloaded('movie:7')).toBe(true);

    const downloading = updates.filter(u => u.status === 'downloading');
    expect(downloading.map(u => u.percent)).toEqual([0, 0, 0]);
    expect(downloading.map(u => u.totalBytes)).toEqual([null, null, null]);
    expect(downloading[2].bytesDownloaded).toBe(3 * MiB);
  });

  it('stops at a chunk boundary, keeps the partial file and holds the queue', async () => {
    provider.serve(movieUrl('1'), 10 * MiB);
    provider.serve(movieUrl('2'), 2 * MiB);
    onUpdate = progress => {
      if (progress.currentFile === 'First [1].mkv' && progress.status === 'downloading' && progress.bytesDownloaded === 3 * MiB) {
        manager.stop();
      }
    };

    await enqueueMovie('1', 'First');
    await enqueueMovie('2', 'Second');
    await expect.poll(() => manager.currentProgress().status).toBe('stopped');

    expect(await fs.readdir(downloads)).toEqual(['First [1].mkv.part']);
    expect((await fs.stat(path.join(downloads, 'First [1].mkv.part'))).size).toBe(3 * MiB);
    expect(manager.isDownloaded('movie:1')).toBe(false);
    expect(manager.listQueue().map(entry => entry.itemId)).toEqual(['movie:2']);
    expect(provider.closed).toEqual([movieUrl('1')]);

    manager.resume();
    await expect.poll(() => manager.isDownloaded('movie:2')).toBe(true);
    expect(manager.isDownloaded('movie:1')).toBe(false);
  });

  it('pauses mid-transfer and continues where it left off', async () => {
    provider.serve(movieUrl('3'), 5 * MiB);
    onUpdate = progress => {
      if (progress.status === 'downloading' && progress.bytesDownloaded === 2 * MiB) {
        manager.pause();
      }
    };

    await enqueueMovie('3', 'Paused');
    await expect.poll(() => manager.currentProgress().status).toBe('paused');

    expect((await fs.stat(path.join(downloads, 'Paused [3].mkv.part'))).size).toBe(2 * MiB);
    await delay(50);
    expect(manager.currentProgress()).toMatchObject({ status: 'paused', bytesDownloaded: 2 * MiB });

    manager.resume();
    await expect.poll(() => manager.isDownloaded('movie:3')).toBe(true);
    expect(await fs.readdir(downloads)).toEqual(['Paused [3].mkv']);
    expect((await fs.stat(path.join(downloads, 'Paused [3].mkv'))).size).toBe(5 * MiB);
  });

  it('goes paused then idle on an empty queue', async () => {
    manager.pause();
    await expect.poll(() => manager.currentProgress().status).toBe('paused');

    manager.resume();
    await expect.poll(() => manager.currentProgress().status).toBe('idle');

    expect(statuses()).toEqual(['paused', 'idle']);
  });

  it('does not dequeue while paused', async () => {
    provider.serve(movieUrl('4'), 2 * MiB);
    manager.pause();
    await expect.poll(() => manager.currentProgress().status).toBe('paused');

    await enqueueMovie('4', 'Waiting');
    await delay(50);

    expect(manager.listQueue()).toHaveLength(1);
    expect(statuses()).not.toContain('starting');

    manager.resume();
    await expect.poll(() => manager.isDownloaded('movie:4')).toBe(true);
  });

  it('reports a failed transfer and moves on to the next job', async () => {
    provider.serve(movieUrl('9'), 2 * MiB);

    await enqueueMovie('404', 'Missing');
    await enqueueMovie('9', 'Present');
    await expect.poll(() => manager.isDownloaded('movie:9')).toBe(true);

    expect(updates.find(u => u.status === 'error')).toMatchObject({
      currentFile: 'Missing [404].mkv',
      errorMessage: 'Request failed with status code 404',
    });
    expect(manager.isDownloaded('movie:404')).toBe(false);
    expect(manager.listQueue()).toEqual([]);
  });

  it('reports a stream that breaks mid-transfer', async () => {
    provider.serve(movieUrl('8'), 4 * MiB, { failAfter: 2 });

    await enqueueMovie('8', 'Broken');
    await expect.poll(() => statuses()).toContain('error');

    expect(updates.find(u => u.status === 'error')?.errorMessage).toBe('socket hang up');
    expect(manager.isDownloaded('movie:8')).toBe(false);
    expect(provider.closed).toEqual([movieUrl('8')]);
  });

  it('does not record a file at or below the size floor', async () => {
    provider.serve(movieUrl('6'), 1000);

    await enqueueMovie('6', 'Tiny');
    await expect.poll(() => statuses()).toContain('complete');

    expect(manager.isDownloaded('movie:6')).toBe(false);
    expect((await fs.stat(path.join(downloads, 'Tiny [6].mkv'))).size).toBe(1000);
  });

  it('writes to a sanitized filename', async () => {
    provider.serve(movieUrl('10'), 2 * MiB);

    await enqueueMovie('10', 'What? Movie: Part 1');
    await expect.poll(() => manager.isDownloaded('movie:10')).toBe(true);

    expect(store.get('movie:10')?.filename).toBe('What Movie Part 1 [10].mkv');
  });

  it('does not take a stopped transfer for a finished one on the next scan', async () => {
    provider.serve(movieUrl('1'), 10 * MiB);
    onUpdate = progress => {
      if (progress.status === 'downloading' && progress.bytesDownloaded === 3 * MiB) {
        manager.stop();
      }
    };

    await enqueueMovie('1', 'First');
    await expect.poll(() => manager.currentProgress().status).toBe('stopped');

    expect(await manager.scanFiles()).toBe(0);
    expect(await enqueueMovie('1', 'First')).toMatchObject({ status: 'queued' });
    expect(manager.isDownloaded('movie:1')).toBe(false);
  });

  it('does not take a broken transfer for a finished one on the next scan', async () => {
    provider.serve(movieUrl('8'), 5 * MiB, { failAfter: 3 });

    await enqueueMovie('8', 'Broken');
    await expect.poll(() => statuses()).toContain('error');
    await expect.poll(() => manager.currentProgress().status).toBe('idle');

    expect(await fs.readdir(downloads)).toEqual(['Broken [8].mkv.part']);
    expect(await manager.scanFiles()).toBe(0);
    manager.stop();
    expect(await enqueueMovie('8', 'Broken')).toMatchObject({ status: 'queued' });
    expect(manager.isDownloaded('movie:8')).toBe(false);
  });

  it('keeps two items with the same title in separate files', async () => {
    provider.serve(movieUrl('1'), 2 * MiB);
    provider.serve(movieUrl('2'), 3 * MiB);

    await enqueueMovie('1', 'Dune');
    await enqueueMovie('2', 'Dune');
    await expect.poll(() => manager.isDownloaded('movie:2')).toBe(true);

    expect(store.get('movie:1')?.filename).toBe('Dune [1].mkv');
    expect(store.get('movie:2')?.filename).toBe('Dune [2].mkv');
    expect((await fs.readdir(downloads)).sort()).toEqual(['Dune [1].mkv', 'Dune [2].mkv']);
    expect((await fs.stat(path.join(downloads, 'Dune [1].mkv'))).size).toBe(2 * MiB);
    expect((await fs.stat(path.join(downloads, 'Dune [2].mkv'))).size).toBe(3 * MiB);
  });

  it('keeps path separators in a title from leaving the download directory', async () => {
    provider.serve(movieUrl('11'), 2 * MiB);

    await enqueueMovie('11', '../escaped');
    await expect.poll(() => manager.isDownloaded('movie:11')).toBe(true);

    expect(await fs.readdir(downloads)).toEqual(['..escaped [11].mkv']);
    expect((await fs.readdir(root)).sort()).toEqual(['downloads', 'downloads.json']);
  });
});
