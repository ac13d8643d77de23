export type QueuedUpdate<TContext> = (context: TContext) => void;

/**
 * FIFO mailbox between producers and the render loop. Appends and the
 * swap-out in `drain` are synchronous, so neither side ever waits on the
 * other's work; queued closures run only after they have been swapped out.
 */
export class CommandQueue<TContext> {
  private pending: QueuedUpdate<TContext>[] = [];

  enqueue(update: QueuedUpdate<TContext>): number {
    this.pending.push(update);
    return this.pending.length;
  }

  drain(): QueuedUpdate<TContext>[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  clear(): number {
    const discarded = this.pending.length;
    this.pending = [];
    return discarded;
  }

  get size(): number {
    return this.pending.length;
  }
}
