/**
 * Capacity-1 request queue. A task starts only after the previous one settled,
 * so there is never more than one host request outstanding.
 * Tasks have no timeout: one that never settles stalls every later task.
 */
export class RequestGate {
  private tail: Promise<void> = Promise.resolve();
  private active = 0;

  get inFlight(): number {
    return this.active;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(async () => {
      this.active++;
      try {
        return await task();
      } finally {
        this.active--;
      }
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
