import * as path from 'path';
import type { MatchTarget, ParsedFilename } from '../types/download.js';

const SEPARATOR_RUNS = /[\s_-]+/g;
const EXTENSION = /\.[a-z0-9]{2,5}$/i;
const EPISODE_PATTERN = /(?<![a-z0-9])s(\d{1,3})\s*e(\d{1,4})(?!\d)/i;
const ILLEGAL_PATH_CHARS = /[<>:"/\\|?*]/g;

export const DEFAULT_MOVIE_TOLERANCE = 0.5;

// Suffix of a transfer still being written; renamed away once the transfer completes
export const PARTIAL_SUFFIX = '.part';

export function isPartialFile(filename: string): boolean {
  return filename.endsWith(PARTIAL_SUFFIX);
}

/**
 * Lowercase and collapse runs of spaces, dashes and underscores into single spaces
 */
export function normalizeName(str: string): string {
  return str.toLowerCase().replace(SEPARATOR_RUNS, ' ').trim();
}

export function stripExtension(filename: string): string {
  return filename.replace(EXTENSION, '');
}

/**
 * Match key for a file on disk: extension removed, then normalized
 */
export function normalizeFilename(filename: string): string {
  return normalizeName(stripExtension(path.basename(filename)));
}

/**
 * Classify a filename as an episode (SxxEyy marker) or a movie.
 * The series name is what precedes the marker, separators collapsed, case kept.
 */
export function parseFilename(filename: string): ParsedFilename {
  const base = stripExtension(path.basename(filename));
  const match = base.match(EPISODE_PATTERN);

  if (match && match.index !== undefined) {
    return {
      type: 'episode',
      seriesName: base.slice(0, match.index).replace(SEPARATOR_RUNS, ' ').trim(),
      season: parseInt(match[1], 10),
      episode: parseInt(match[2], 10),
    };
  }

  return { type: 'movie', normalizedName: normalizeName(base) };
}

function isSubstringEither(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

/**
 * Movie names match when one contains the other and their lengths differ by
 * less than `tolerance` of the longer name ("heat" never matches "the heat of the night").
 * Both names are expected to be normalized already.
 */
export function isMovieNameMatch(
  fileName: string,
  catalogName: string,
  tolerance: number = DEFAULT_MOVIE_TOLERANCE
): boolean {
  if (!fileName || !catalogName) return false;
  if (!isSubstringEither(fileName, catalogName)) return false;

  const longer = Math.max(fileName.length, catalogName.length);
  return Math.abs(fileName.length - catalogName.length) < longer * tolerance;
}

/**
 * Episodes need the exact season and episode plus related series names
 */
export function isEpisodeMatch(
  file: { seriesName: string; season: number; episode: number },
  target: { seriesName: string; season: number; episode: number }
): boolean {
  if (file.season !== target.season || file.episode !== target.episode) return false;

  const fileSeries = normalizeName(file.seriesName);
  const targetSeries = normalizeName(target.seriesName);
  if (!fileSeries || !targetSeries) return false;

  return isSubstringEither(fileSeries, targetSeries);
}

/**
 * Check a parsed file against a catalog item
 */
export function matchesTarget(
  parsed: ParsedFilename,
  target: MatchTarget,
  movieTolerance: number = DEFAULT_MOVIE_TOLERANCE
): boolean {
  switch (target.kind) {
    case 'movie':
      return parsed.type === 'movie'
        && isMovieNameMatch(parsed.normalizedName, normalizeName(target.name), movieTolerance);
    case 'episode':
      return parsed.type === 'episode' && isEpisodeMatch(parsed, target);
  }
}

/**
 * Remove characters that are illegal in file paths
 */
export function sanitizeFilename(name: string): string {
  return name.replace(ILLEGAL_PATH_CHARS, '').trim();
}

export function formatEpisodeCode(season: number, episode: number): string {
  return `S${String(season).padStart(2, '0')}E${String(episode).padStart(2, '0')}`;
}

export function bytesToMb(bytes: number): number {
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}
