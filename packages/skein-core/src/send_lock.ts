const noop = (): void => {};

/**
 * Mutex for async critical sections.
 *
 * Sections passed to `run` execute one at a time, in call order, even when
 * they await in the middle. A section that throws does not poison the lock.
 */
export class SendLock {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  /** Sections queued or running. */
  get pending(): number {
    return this.depth;
  }

  run<T>(section: () => T | Promise<T>): Promise<T> {
    this.depth++;
    const result = this.tail.then(section).finally(() => {
      this.depth--;
    });
    this.tail = result.then(noop, noop);
    return result;
  }
}
