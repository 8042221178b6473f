/**
 * Single-consumer, coalescing scan trigger. At most one scan runs at a
 * time; any number of requests made while it runs collapse into one
 * follow-up scan. The returned promise settles once no scan is pending.
 */
export class ScanQueue {
  private running: Promise<void> | null = null;
  private again = false;

  constructor(private readonly scan: () => Promise<void>) {}

  request(): Promise<void> {
    if (this.running) {
      this.again = true;
      return this.running;
    }
    this.running = this.loop();
    return this.running;
  }

  /** Resolves when the current scan (and its follow-up) has finished. */
  idle(): Promise<void> {
    return this.running ?? Promise.resolve();
  }

  get busy(): boolean {
    return this.running !== null;
  }

  private async loop(): Promise<void> {
    try {
      do {
        this.again = false;
        try {
          await this.scan();
        } catch (err) {
          console.error("[watcher] Scan failed:", err);
        }
      } while (this.again);
    } finally {
      // cleared in the same turn as the last `again` check
      this.running = null;
    }
  }
}
