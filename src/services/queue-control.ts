import type { QueueControlState } from '../types/download.js';

/**
 * Pause / stop flags read by the worker between jobs and before every chunk.
 * Transitions are plain state changes; waking the worker is the caller's job.
 */
export class QueueControl {
  private paused = false;
  private stopped = false;

  pause(): void {
    this.paused = true;
  }

  /**
   * Clears a pause and a stop alike
   */
  resume(): void {
    this.paused = false;
    this.stopped = false;
  }

  stop(): void {
    this.stopped = true;
    this.paused = false;
  }

  isPaused(): boolean {
    return this.paused;
  }

  isStopped(): boolean {
    return this.stopped;
  }

  snapshot(): QueueControlState {
    return { paused: this.paused, stopped: this.stopped };
  }
}
