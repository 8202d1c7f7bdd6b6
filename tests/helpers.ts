import { mkdtemp, mkdir } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { TransferError } from '../src/utils/errors.js';
import type {
  CatalogBrowser,
  CatalogCategory,
  CatalogEpisode,
  CatalogStream,
  TransferStream,
} from '../src/catalog/base.js';
import type { Job, MediaKind } from '../src/types/download.js';

export const MiB = 1024 * 1024;

interface ServedFile {
  chunks: Buffer[];
  totalBytes: number | null;
  failAfter: number | null;
}

/**
 * In-process catalog: serves generated bytes for registered URLs, 404 for everything else
 */
export class FakeProvider implements CatalogBrowser {
  readonly name = 'Fake';
  readonly closed: string[] = [];
  categories: CatalogCategory[] = [];
  readonly streams = new Map<string, CatalogStream[]>();
  readonly episodes = new Map<string, CatalogEpisode[]>();
  private readonly files = new Map<string, ServedFile>();

  buildStreamUrl(kind: MediaKind, id: string, extension: string): string {
    return `http://catalog.test/${kind}/${id}.${extension}`;
  }

  /**
   * Serve `size` bytes in `chunkSize` pieces. `failAfter` breaks the stream after that many pieces.
   */
  serve(
    url: string,
    size: number,
    options: { chunkSize?: number; advertise?: boolean; failAfter?: number } = {}
  ): void {
    const chunkSize = options.chunkSize ?? MiB;
    const chunks: Buffer[] = [];
    for (let offset = 0; offset < size; offset += chunkSize) {
      chunks.push(Buffer.alloc(Math.min(chunkSize, size - offset), 0x61));
    }
    this.files.set(url, {
      chunks,
      totalBytes: options.advertise === false ? null : size,
      failAfter: options.failAfter ?? null,
    });
  }

  async openStream(url: string): Promise<TransferStream> {
    const file = this.files.get(url);
    if (!file) {
      throw new TransferError('Request failed with status code 404', 404);
    }

    const { chunks, failAfter } = file;
    async function* body(): AsyncGenerator<Buffer> {
      for (const [index, chunk] of chunks.entries()) {
        if (failAfter !== null && index >= failAfter) {
          throw new Error('socket hang up');
        }
        yield chunk;
      }
    }

    return {
      totalBytes: file.totalBytes,
      body: body(),
      close: () => {
        this.closed.push(url);
      },
    };
  }

  async getSeriesEpisodes(seriesId: string): Promise<CatalogEpisode[]> {
    const episodes = this.episodes.get(seriesId);
    if (!episodes) {
      throw new Error(`Unknown series ${seriesId}`);
    }
    return episodes;
  }

  async getCategories(): Promise<CatalogCategory[]> {
    return this.categories;
  }

  async getStreams(kind: MediaKind, categoryId: string): Promise<CatalogStream[]> {
    const streams = this.streams.get(`${kind}:${categoryId}`);
    if (!streams) {
      throw new Error(`Unknown category ${kind}:${categoryId}`);
    }
    return streams;
  }
}

export async function makeTempDir(): Promise<{ root: string; downloads: string; storeFile: string }> {
  const root = await mkdtemp(path.join(tmpdir(), 'vod-downloader-'));
  const downloads = path.join(root, 'downloads');
  await mkdir(downloads);
  return { root, downloads, storeFile: path.join(root, 'downloads.json') };
}

export function makeJob(id: string, itemId: string = `movie:${id}`): Job {
  return {
    id,
    itemId,
    kind: 'movie',
    url: `http://catalog.test/movie/${id}.mp4`,
    destinationPath: `/downloads/${id}.mp4`,
    filename: `${id}.mp4`,
    displayName: `Movie ${id}`,
  };
}
