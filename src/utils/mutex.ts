/**
 * Promise-based mutex; callers queue in arrival order.
 */
export class SimpleMutex {
  private locked = false;
  private queue: (() => void)[] = [];

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();

    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve();
      } else {
        this.queue.push(resolve);
      }
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
