import { systemClock, type Clock } from './clock';

/**
 * Cooperative cancellation shared by the scheduler loops.
 *
 * `wait` never blocks for longer than `stepMs` at a time, so a loop parked
 * between ticks notices `request()` within one step.
 */
export class ShutdownSignal {
  private flag = false;

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly stepMs = 1000
  ) {}

  get requested(): boolean {
    return this.flag;
  }

  request(): void {
    this.flag = true;
  }

  /** Resolves `true` when the full delay elapsed, `false` when shutdown cut it short. */
  async wait(ms: number): Promise<boolean> {
    const until = this.clock.now() + ms;
    while (!this.flag) {
      const remaining = until - this.clock.now();
      if (remaining <= 0) return true;
      await this.clock.sleep(Math.min(remaining, this.stepMs));
    }
    return false;
  }
}
