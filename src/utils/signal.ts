/**
 * One-shot wake-up for a waiting loop: every pending `wait()` resolves on the next `notify()`.
 * Checking state and calling `wait()` in the same synchronous step cannot miss a notify.
 */
export class Signal {
  private waiters: Array<() => void> = [];

  wait(): Promise<void> {
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
