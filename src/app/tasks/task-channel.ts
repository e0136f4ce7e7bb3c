/**
 * TaskChannel is a FIFO hand-off from the task body to its consumers.
 * Items are retained so late subscribers and pollers see the full history; `close()`
 * ends every pending iteration.
 */

export class TaskChannel<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<() => void> = [];
  private closed = false;

  push(item: T): void {
    if (this.closed) {
      throw new Error("Cannot push to a closed task channel");
    }
    this.items.push(item);
    this.wake();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wake();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get length(): number {
    return this.items.length;
  }

  /** Items at or after `cursor`, with the cursor to pass next time. */
  since(cursor: number): { items: T[]; nextCursor: number; closed: boolean } {
    const start = Math.max(0, Math.min(cursor, this.items.length));
    return {
      items: this.items.slice(start),
      nextCursor: this.items.length,
      closed: this.closed,
    };
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    let index = 0;
    while (true) {
      if (index < this.items.length) {
        yield this.items[index];
        index += 1;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  private wake(): void {
    const waiting = this.waiters.splice(0, this.waiters.length);
    for (const resolve of waiting) resolve();
  }
}
