import { sleep as defaultSleep, type Sleep } from './sleep';

/**
 * Enforces a minimum delay between consecutive calls to `wait()`.
 * One instance is shared by every send on a channel.
 */
export class Throttle {
  private nextAllowedAt = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  async wait(): Promise<void> {
    const current = this.now();
    const delay = this.nextAllowedAt - current;
    if (delay > 0) {
      await this.sleep(delay);
    }
    this.nextAllowedAt = Math.max(current, this.nextAllowedAt) + this.minIntervalMs;
  }
}
