export type MediaKind = 'movie' | 'series';

export type DownloadStatus =
  | 'idle'        // Nothing to do
  | 'starting'    // Opening the transfer
  | 'downloading' // Writing chunks
  | 'complete'    // Last job finished, shown until the cooldown ends
  | 'paused'      // User paused
  | 'stopped'     // User stopped, nothing is dequeued until resume
  | 'error';      // Last transfer failed

interface BaseJob {
  id: string;
  itemId: string;
  url: string;
  destinationPath: string;
  filename: string;
  displayName: string;
}

export interface MovieJob extends BaseJob {
  kind: 'movie';
}

export interface EpisodeJob extends BaseJob {
  kind: 'episode';
  seriesName: string | null;
  season: number | null;
  episode: number | null;
}

export type Job = MovieJob | EpisodeJob;

export interface QueueEntry {
  jobId: string;
  displayName: string;
  kind: Job['kind'];
  itemId: string;
}

export interface QueueControlState {
  paused: boolean;
  stopped: boolean;
}

export interface ProgressState {
  currentFile: string | null;
  bytesDownloaded: number;
  totalBytes: number | null;
  percent: number;          // 0-100, untouched while the total is unknown
  status: DownloadStatus;
  queueDepth: number;
  errorMessage: string | null;
}

export interface DownloadRecord {
  itemId: string;
  downloadedAt: number;     // epoch seconds
  filename: string;
  sizeMb: number;
}

export type ParsedFilename =
  | { type: 'movie'; normalizedName: string }
  | { type: 'episode'; seriesName: string; season: number; episode: number };

export interface ScannedFileRecord {
  normalizedKey: string;
  filename: string;
  sizeMb: number;
  scannedAt: number;        // epoch seconds
  parsed: ParsedFilename;
}

export type MatchTarget =
  | { kind: 'movie'; name: string }
  | { kind: 'episode'; seriesName: string; season: number; episode: number };

export interface EnqueueRequest {
  kind: MediaKind;
  catalogId: string;
  extension: string;
  title: string;
  episode?: {
    seriesName: string;
    season: number;
    episode: number;
  };
}

export type EnqueueResult =
  | { status: 'queued'; jobId: string }
  | { status: 'already-queued' }
  | { status: 'already-downloaded' };

export type UnmarkResult = 'removed' | 'not-found' | 'save-failed';
