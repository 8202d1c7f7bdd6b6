import type { ProgressState } from '../types/download.js';

export const IDLE_PROGRESS: Readonly<ProgressState> = Object.freeze({
  currentFile: null,
  bytesDownloaded: 0,
  totalBytes: null,
  percent: 0,
  status: 'idle',
  queueDepth: 0,
  errorMessage: null,
});

/**
 * The one live progress snapshot. Each update swaps in a new frozen object,
 * so a reader holding a snapshot never sees half of an update.
 */
export class ProgressTracker {
  private state: Readonly<ProgressState> = IDLE_PROGRESS;

  constructor(private readonly onUpdate?: (progress: Readonly<ProgressState>) => void) {}

  update(patch: Partial<ProgressState>): Readonly<ProgressState> {
    this.state = Object.freeze({ ...this.state, ...patch });
    this.onUpdate?.(this.state);
    return this.state;
  }

  snapshot(): Readonly<ProgressState> {
    return this.state;
  }
}
