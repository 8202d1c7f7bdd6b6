import * as path from 'path';
import { watch, type FSWatcher } from 'chokidar';
import { isPartialFile } from '../utils/text.js';

export interface WatcherOptions {
  rescanDelayMs?: number;       // quiet period before a burst of events triggers one rescan
  writeStabilityMs?: number;    // a new file must stop growing this long before it counts
}

const DEFAULT_RESCAN_DELAY_MS = 3000;
const DEFAULT_WRITE_STABILITY_MS = 2000;

let watcher: FSWatcher | null = null;
let rescanTimer: NodeJS.Timeout | null = null;

/**
 * Dotfiles, store temp files and unfinished transfers
 */
export function isIgnoredPath(filePath: string): boolean {
  const name = path.basename(filePath);
  return name.startsWith('.') || name.endsWith('.tmp') || isPartialFile(name);
}

/**
 * Watch the download directory and rescan it when files come or go.
 * Bursts of events (a season copied in at once) collapse into one rescan.
 * Resolves once the initial directory walk is done.
 */
export async function startWatcher(
  directory: string,
  rescan: () => Promise<number>,
  options: WatcherOptions = {}
): Promise<void> {
  if (watcher) return;

  const rescanDelayMs = options.rescanDelayMs ?? DEFAULT_RESCAN_DELAY_MS;
  const writeStabilityMs = options.writeStabilityMs ?? DEFAULT_WRITE_STABILITY_MS;

  const scheduleRescan = (reason: string) => {
    if (rescanTimer) {
      clearTimeout(rescanTimer);
    }
    rescanTimer = setTimeout(() => {
      rescanTimer = null;
      console.log(`[Watcher] Rescanning after ${reason}`);
      rescan().catch(error => {
        console.error('[Watcher] Rescan failed:', error);
      });
    }, rescanDelayMs);
  };

  const current = watch(directory, {
    ignored: (filePath: string) => filePath !== directory && isIgnoredPath(filePath),
    persistent: true,
    ignoreInitial: true, // The startup scan already covered existing files
    depth: 0,
    awaitWriteFinish: {
      stabilityThreshold: writeStabilityMs,
      pollInterval: Math.min(100, writeStabilityMs),
    },
  });
  watcher = current;

  current.on('add', (filePath) => scheduleRescan(`new file ${filePath}`));
  current.on('unlink', (filePath) => scheduleRescan(`removed file ${filePath}`));
  current.on('error', (error) => {
    console.error('[Watcher] Error:', error);
  });

  await new Promise<void>(resolve => current.once('ready', resolve));
  console.log(`[Watcher] Watching: ${directory}`);
}

export async function stopWatcher(): Promise<void> {
  if (rescanTimer) {
    clearTimeout(rescanTimer);
    rescanTimer = null;
  }

  if (watcher) {
    await watcher.close();
    watcher = null;
  }

  console.log('[Watcher] Stopped');
}
