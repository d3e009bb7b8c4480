/**
 * Admission gate: at most `limit` tasks run at once, the rest wait in FIFO order.
 * Created per pipeline run and handed to every fetch, so separate runs never share slots.
 */
export class AdmissionGate {
  readonly limit: number;
  private active = 0;
  private waiting: Array<() => void> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Admission limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  get inFlight(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiting.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active += 1;
      return Promise.resolve();
    }
    // the slot is handed over directly by release(), active stays unchanged
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release() {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.active -= 1;
  }
}
