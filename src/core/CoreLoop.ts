/**
 * Fixed-rate timer for paced playback. Calls onTick until it returns false
 * or stop() is called. The simulation itself never waits on it.
 */
export class CoreLoop {
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private tickMs: number;

  constructor(tickRateHz: number, private onTick: () => boolean) {
    this.tickMs = 1000 / tickRateHz;
  }

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  start(): void {
    if (this.intervalId !== null) return;
    this.intervalId = setInterval(() => {
      if (!this.onTick()) this.stop();
    }, this.tickMs);
  }

  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }
}
