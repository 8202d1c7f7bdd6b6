import axios, { AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import { createHttpClient } from '../utils/http.js';
import { TransferError, errorMessage } from '../utils/errors.js';
import type {
  CatalogBrowser,
  CatalogCategory,
  CatalogEpisode,
  CatalogStream,
  TransferStream,
} from './base.js';
import type { MediaKind } from '../types/download.js';

export interface XtreamOptions {
  url: string;
  username: string;
  password: string;
  timeoutMs?: number;
}

// Provider payloads. Ids come back as numbers or strings depending on the panel.
interface XtreamCategory {
  category_id: string | number;
  category_name?: string;
  parent_id?: number;
}

interface XtreamVodStream {
  stream_id: string | number;
  name?: string;
  stream_icon?: string;
  container_extension?: string;
  category_id?: string | number;
}

interface XtreamSeries {
  series_id: string | number;
  name?: string;
  cover?: string;
  category_id?: string | number;
}

interface XtreamEpisode {
  id: string | number;
  episode_num?: string | number;
  season?: string | number;
  title?: string;
  container_extension?: string;
}

export interface XtreamSeriesInfo {
  info?: {
    name?: string;
    cover?: string;
    plot?: string;
  };
  // Seasons keyed by number; an empty series is sent as []
  episodes?: Record<string, XtreamEpisode[]>;
}

function toInt(value: string | number | undefined, fallback: number): number {
  const parsed = typeof value === 'number' ? value : parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Client for Xtream Codes style panels (player_api.php)
 */
export class XtreamClient implements CatalogBrowser {
  readonly name = 'Xtream';
  private readonly http: AxiosInstance;

  constructor(
    private readonly options: XtreamOptions,
    http?: AxiosInstance
  ) {
    this.http = http ?? createHttpClient(options.url, options.timeoutMs);
  }

  buildStreamUrl(kind: MediaKind, id: string, extension: string): string {
    const { url, username, password } = this.options;
    return `${url}/${kind}/${encodeURIComponent(username)}/${encodeURIComponent(password)}/${encodeURIComponent(id)}.${encodeURIComponent(extension)}`;
  }

  async openStream(url: string): Promise<TransferStream> {
    try {
      const response = await this.http.get<Readable>(url, {
        responseType: 'stream',
        timeout: 0,
      });
      const length = Number(response.headers['content-length']);

      return {
        totalBytes: Number.isFinite(length) && length > 0 ? length : null,
        body: response.data,
        close: () => response.data.destroy(),
      };
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status ?? null : null;
      throw new TransferError(errorMessage(error), status);
    }
  }

  async getCategories(): Promise<CatalogCategory[]> {
    const [movieCategories, seriesCategories] = await Promise.all([
      this.apiGet<XtreamCategory[]>('get_vod_categories'),
      this.apiGet<XtreamCategory[]>('get_series_categories'),
    ]);

    const toCategory = (kind: MediaKind, label: string) => (category: XtreamCategory): CatalogCategory => {
      const name = category.category_name ?? '';
      return {
        id: String(category.category_id),
        kind,
        name,
        displayName: `[${label}] ${name}`,
      };
    };

    return [
      ...(Array.isArray(movieCategories) ? movieCategories.map(toCategory('movie', 'Movie')) : []),
      ...(Array.isArray(seriesCategories) ? seriesCategories.map(toCategory('series', 'Series')) : []),
    ];
  }

  /**
   * Movies of a VOD category, or the shows (not episodes) of a series category
   */
  async getStreams(kind: MediaKind, categoryId: string): Promise<CatalogStream[]> {
    if (kind === 'movie') {
      const streams = await this.apiGet<XtreamVodStream[]>('get_vod_streams', { category_id: categoryId });
      if (!Array.isArray(streams)) return [];
      return streams.map(stream => ({
        id: String(stream.stream_id),
        kind,
        name: stream.name ?? '',
        extension: stream.container_extension || 'mp4',
        icon: stream.stream_icon || null,
      }));
    }

    const shows = await this.apiGet<XtreamSeries[]>('get_series', { category_id: categoryId });
    if (!Array.isArray(shows)) return [];
    return shows.map(show => ({
      id: String(show.series_id),
      kind,
      name: show.name ?? '',
      extension: null,
      icon: show.cover || null,
    }));
  }

  getSeriesInfo(seriesId: string): Promise<XtreamSeriesInfo> {
    return this.apiGet<XtreamSeriesInfo>('get_series_info', { series_id: seriesId });
  }

  async getSeriesEpisodes(seriesId: string): Promise<CatalogEpisode[]> {
    const data = await this.getSeriesInfo(seriesId);
    const seriesName = data.info?.name ?? '';
    const episodes: CatalogEpisode[] = [];

    for (const [seasonKey, seasonEpisodes] of Object.entries(data.episodes ?? {})) {
      if (!Array.isArray(seasonEpisodes)) continue;
      for (const episode of seasonEpisodes) {
        episodes.push({
          id: String(episode.id),
          seriesName,
          season: toInt(episode.season, toInt(seasonKey, 0)),
          episode: toInt(episode.episode_num, 0),
          title: episode.title ?? '',
          extension: episode.container_extension || 'mp4',
        });
      }
    }

    console.log(`[Xtream] Series ${seriesId} (${seriesName}): ${episodes.length} episodes`);
    return episodes;
  }

  private async apiGet<T>(action: string, params: Record<string, string> = {}): Promise<T> {
    const { username, password } = this.options;
    try {
      const response = await this.http.get<T>('/player_api.php', {
        params: { ...params, username, password, action },
        responseType: 'json',
      });
      return response.data;
    } catch (error) {
      console.error(`[Xtream] API error (${action}): ${errorMessage(error)}`);
      throw error;
    }
  }
}
