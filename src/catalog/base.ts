import type { MediaKind } from '../types/download.js';

/**
 * An open transfer: the advertised size (when the server sends one) and the body
 */
export interface TransferStream {
  totalBytes: number | null;
  body: AsyncIterable<Buffer>;
  // Release the connection; safe to call after the body was fully read
  close(): void;
}

export interface CatalogEpisode {
  id: string;
  seriesName: string;
  season: number;
  episode: number;
  title: string;
  extension: string;
}

export interface CatalogCategory {
  id: string;
  kind: MediaKind;
  name: string;
  displayName: string;
}

export interface CatalogStream {
  id: string;
  kind: MediaKind;
  name: string;
  extension: string | null;
  icon: string | null;
}

/**
 * Source of catalog metadata and media bytes
 */
export interface CatalogProvider {
  readonly name: string;

  /**
   * Direct download URL of a movie or an episode
   */
  buildStreamUrl(kind: MediaKind, id: string, extension: string): string;

  /**
   * Open a streamed GET. Rejects with a TransferError on network failure or a non-success status.
   */
  openStream(url: string): Promise<TransferStream>;

  /**
   * Every episode of a series, all seasons flattened
   */
  getSeriesEpisodes(seriesId: string): Promise<CatalogEpisode[]>;
}

/**
 * A provider that can also be browsed: categories, then the movies or shows in one
 */
export interface CatalogBrowser extends CatalogProvider {
  getCategories(): Promise<CatalogCategory[]>;
  getStreams(kind: MediaKind, categoryId: string): Promise<CatalogStream[]>;
}
