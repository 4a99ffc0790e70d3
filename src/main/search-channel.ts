/**
 * One-way queue from background search tasks to the foreground session.
 *
 * Producers `post` messages; the consumer is told at most once per
 * event-loop turn that messages are waiting and drains them all at once.
 * Messages are delivered in posting order. The channel never filters;
 * discarding stale generations is the consumer's job.
 */
export class SearchChannel<T> {
  private queue: T[] = [];
  private pendingNotify: NodeJS.Immediate | null = null;
  private listener: (() => void) | null = null;
  private closed = false;

  post(message: T): void {
    if (this.closed) return;
    this.queue.push(message);
    this.scheduleNotify();
  }

  drain(): T[] {
    if (this.queue.length === 0) return [];
    const messages = this.queue;
    this.queue = [];
    return messages;
  }

  onReadable(listener: () => void): void {
    this.listener = listener;
    if (this.queue.length > 0) this.scheduleNotify();
  }

  close(): void {
    this.closed = true;
    this.queue = [];
    this.listener = null;
    if (this.pendingNotify) {
      clearImmediate(this.pendingNotify);
      this.pendingNotify = null;
    }
  }

  private scheduleNotify(): void {
    if (this.pendingNotify || !this.listener) return;
    this.pendingNotify = setImmediate(() => {
      this.pendingNotify = null;
      if (this.queue.length > 0) this.listener?.();
    });
  }
}
