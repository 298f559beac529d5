// Hand-off queue between code that must not wait and a consumer that awaits.
//
// Two users: a call's completion is pushed when it settles (from the
// receive loop or a deadline timer), and a listener pushes accepted
// connections for accept() to pick up.

/**
 * Fixed-capacity queue. `send` gives the value to a pending `recv`, or
 * buffers it, and returns false rather than waiting when there is no room
 * or the channel is closed. Values buffered before close() can still be
 * received; after that `recv` resolves with null.
 */
export class Channel<T> {
  private slots: T[] = [];
  private head = 0;
  private readonly receivers: Array<(value: T | null) => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`channel capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  /** Values buffered and not yet received. */
  get length(): number {
    return this.slots.length - this.head;
  }

  send(value: T): boolean {
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return true;
    }
    if (this.length >= this.capacity) return false;
    this.slots.push(value);
    return true;
  }

  recv(): Promise<T | null> {
    if (this.length > 0) {
      return Promise.resolve(this.take());
    }
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const receivers = this.receivers.splice(0);
    for (const receiver of receivers) receiver(null);
  }

  isClosed(): boolean {
    return this.closed;
  }

  private take(): T {
    const value = this.slots[this.head];
    this.head++;
    if (this.head === this.slots.length || this.head > this.capacity) {
      this.slots = this.slots.slice(this.head);
      this.head = 0;
    }
    return value;
  }
}

export function createChannel<T>(capacity = 1): Channel<T> {
  return new Channel<T>(capacity);
}
