// Promise-chained lock: callers run one at a time in arrival order.
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get locked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.holders += 1;

    await previous;
    try {
      return await task();
    } finally {
      this.holders -= 1;
      release();
    }
  }
}
