import type { Scheduler } from "../../src/render/frameLoop.js";

/** Holds requested callbacks until the test flushes them. */
export class FakeScheduler implements Scheduler {
  pending = new Map<number, () => void>();
  cancelled: number[] = [];
  private next = 1;

  request(callback: () => void): number {
    const handle = this.next++;
    this.pending.set(handle, callback);
    return handle;
  }

  cancel(handle: number): void {
    this.cancelled.push(handle);
    this.pending.delete(handle);
  }

  flush(): void {
    const callbacks = Array.from(this.pending.values());
    this.pending.clear();
    for (const cb of callbacks) cb();
  }
}
