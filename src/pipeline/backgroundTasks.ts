/**
 * Fire-and-forget work started from request handlers (pipeline runs,
 * approval fan-out, scans). Failures are logged; `drain()` lets shutdown
 * and tests wait for everything in flight.
 */
export class BackgroundTasks {
  private readonly pending = new Set<Promise<void>>();

  run(label: string, fn: () => Promise<unknown>): void {
    const task: Promise<void> = Promise.resolve()
      .then(fn)
      .then(
        () => undefined,
        (err: unknown) => {
          console.error(`[background] ${label} failed:`, err);
        }
      )
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  get size(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    // tasks may start more tasks while draining
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }
}
