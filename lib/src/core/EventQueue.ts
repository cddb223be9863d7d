export type EventHandler<T> = (event: T) => void | Promise<void>;

/**
 * Ordered FIFO feeding a single consumer. Events are handled strictly one
 * at a time, so the handler never runs concurrently with itself.
 */
export class EventQueue<T> {
  private items: T[] = [];
  private draining: Promise<void> | null = null;
  private closed = false;

  constructor(
    private readonly handler: EventHandler<T>,
    private readonly onError: (error: unknown, event: T) => void
  ) {}

  enqueue(event: T): void {
    if (this.closed) {
      return;
    }
    this.items.push(event);
    this.scheduleDrain();
  }

  get size(): number {
    return this.items.length;
  }

  get busy(): boolean {
    return this.draining !== null || this.items.length > 0;
  }

  // Drops anything still queued; later enqueues are ignored
  close(): void {
    this.closed = true;
    this.items = [];
  }

  /**
   * Resolves once the queue is empty, including events enqueued while
   * waiting.
   */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private scheduleDrain(): void {
    if (this.draining) {
      return;
    }
    this.draining = this.drain().finally(() => {
      this.draining = null;
      // An event may have arrived after the last shift but before this ran
      if (this.items.length > 0 && !this.closed) {
        this.scheduleDrain();
      }
    });
  }

  private async drain(): Promise<void> {
    // Let the caller finish its synchronous work before the first event runs
    await Promise.resolve();
    let event = this.items.shift();
    while (event !== undefined) {
      try {
        await this.handler(event);
      } catch (error) {
        this.onError(error, event);
      }
      event = this.items.shift();
    }
  }
}
