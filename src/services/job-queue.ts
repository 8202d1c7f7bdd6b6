import { DuplicateJobError, EmptyQueueError, JobNotFoundError } from '../utils/errors.js';
import type { Job } from '../types/download.js';

/**
 * FIFO of pending jobs plus the set of item ids they target.
 * Every method is synchronous, so each call is a single step on the event loop
 * and callers never observe the list and the membership set out of step.
 */
export class JobQueue {
  private jobs: Job[] = [];
  private queuedItems = new Set<string>();

  /**
   * Append a job, returns its id
   */
  enqueue(job: Job): string {
    if (this.queuedItems.has(job.itemId)) {
      throw new DuplicateJobError(job.itemId);
    }
    this.jobs.push(job);
    this.queuedItems.add(job.itemId);
    return job.id;
  }

  /**
   * Remove and return the head. The item id is released at the same time,
   * so the item can be queued again while the worker is still on it.
   */
  dequeueFront(): Job {
    const job = this.tryDequeue();
    if (!job) {
      throw new EmptyQueueError();
    }
    return job;
  }

  tryDequeue(): Job | null {
    const job = this.jobs.shift();
    if (!job) return null;
    this.queuedItems.delete(job.itemId);
    return job;
  }

  remove(jobId: string): Job {
    const index = this.jobs.findIndex(job => job.id === jobId);
    if (index === -1) {
      throw new JobNotFoundError(jobId);
    }
    const [job] = this.jobs.splice(index, 1);
    this.queuedItems.delete(job.itemId);
    return job;
  }

  /**
   * Put the named jobs first, in the given order. Jobs not named keep their
   * relative order after them; unknown or repeated ids are ignored.
   */
  reorder(jobIds: string[]): void {
    const byId = new Map(this.jobs.map(job => [job.id, job]));
    const placed = new Set<string>();
    const ordered: Job[] = [];

    for (const id of jobIds) {
      const job = byId.get(id);
      if (job && !placed.has(id)) {
        ordered.push(job);
        placed.add(id);
      }
    }

    this.jobs = [...ordered, ...this.jobs.filter(job => !placed.has(job.id))];
  }

  /**
   * Drop every pending job, returns how many were dropped
   */
  clear(): number {
    const count = this.jobs.length;
    this.jobs = [];
    this.queuedItems.clear();
    return count;
  }

  list(): Job[] {
    return [...this.jobs];
  }

  size(): number {
    return this.jobs.length;
  }

  contains(itemId: string): boolean {
    return this.queuedItems.has(itemId);
  }
}
