import { describe, it, expect } from 'vitest';
import { QueueControl } from '../src/services/queue-control.js';
import { IDLE_PROGRESS, ProgressTracker } from '../src/services/progress.js';
import type { ProgressState } from '../src/types/download.js';

describe('QueueControl', () => {
  it('starts running', () => {
    expect(new QueueControl().snapshot()).toEqual({ paused: false, stopped: false });
  });

  it('stop clears a pause', () => {
    const control = new QueueControl();
    control.pause();
    control.stop();

    expect(control.snapshot()).toEqual({ paused: false, stopped: true });
  });

  it('resume clears both flags', () => {
    const control = new QueueControl();
    control.stop();
    control.resume();
    expect(control.snapshot()).toEqual({ paused: false, stopped: false });

    control.pause();
    control.resume();
    expect(control.isPaused()).toBe(false);
  });

  it('pause after stop leaves both set until resumed', () => {
    const control = new QueueControl();
    control.stop();
    control.pause();

    expect(control.snapshot()).toEqual({ paused: true, stopped: true });
  });
});

describe('ProgressTracker', () => {
  it('starts idle', () => {
    expect(new ProgressTracker().snapshot()).toBe(IDLE_PROGRESS);
  });

  it('swaps in a new frozen snapshot on each update', () => {
    const seen: ProgressState[] = [];
    const tracker = new ProgressTracker(progress => seen.push(progress));
    const before = tracker.snapshot();

    tracker.update({ status: 'downloading', bytesDownloaded: 10 });

    expect(before.status).toBe('idle');
    expect(tracker.snapshot()).toEqual({ ...IDLE_PROGRESS, status: 'downloading', bytesDownloaded: 10 });
    expect(Object.isFrozen(tracker.snapshot())).toBe(true);
    expect(seen).toHaveLength(1);
    expect(seen[0]).toBe(tracker.snapshot());
  });
});
