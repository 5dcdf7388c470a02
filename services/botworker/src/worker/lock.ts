/**
 * Single-holder async lock. Tasks passed to `use` run one at a time in arrival order.
 */
export class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  async use<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    await new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next();
      return;
    }
    this.locked = false;
  }
}
