import type { Ticker } from '../resilience/types.js';

/**
 * Ticker driven by the test through `tick()`
 */
export class ManualTicker implements Ticker {
  private onTick?: () => void;
  public stopped = false;

  start(onTick: () => void): void {
    this.onTick = onTick;
  }

  stop(): void {
    this.stopped = true;
  }

  tick(times = 1): void {
    for (let i = 0; i < times; i++) {
      if (!this.stopped) {
        this.onTick?.();
      }
    }
  }
}
