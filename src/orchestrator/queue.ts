/**
 * Bounded FIFO of intents with a single consumer
 */

interface PendingIntent {
  run(): Promise<void>;
  cancel(): void;
}

export class IntentQueue {
  private pending: PendingIntent[] = [];
  private active: Promise<void> | null = null;
  private closed = false;

  constructor(private readonly maxPending: number) {}

  /** Intents waiting behind the running one */
  get length(): number {
    return this.pending.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queues work and returns its eventual result, or null when the queue is
   * full or closed. A dropped intent resolves with onCancel().
   */
  enqueue<T>(work: () => Promise<T>, onCancel: () => T): Promise<T> | null {
    if (this.closed || this.pending.length >= this.maxPending) {
      return null;
    }

    return new Promise<T>((resolve, reject) => {
      this.pending.push({
        run: () => work().then(resolve, reject),
        cancel: () => resolve(onCancel())
      });
      this.pump();
    });
  }

  private pump(): void {
    if (this.active || this.closed) return;
    const next = this.pending.shift();
    if (!next) return;
    this.active = next.run().finally(() => {
      this.active = null;
      this.pump();
    });
  }

  /**
   * Stops accepting work, cancels everything still queued and waits for the
   * running intent to finish.
   */
  async close(): Promise<void> {
    this.closed = true;
    const dropped = this.pending.splice(0);
    for (const intent of dropped) {
      intent.cancel();
    }
    if (this.active) {
      await this.active;
    }
  }
}
