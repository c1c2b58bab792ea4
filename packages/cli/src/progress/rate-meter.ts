/**
 * Move rate measurement
 * Uses a rolling window of samples to estimate moves per second and time remaining
 */

/**
 * Sample for progress tracking
 */
interface ProgressSample {
  timestamp: number;
  progress: number;
}

/**
 * Rolling-window rate meter
 */
export class RateMeter {
  private samples: ProgressSample[] = [];
  private readonly windowSize: number;
  private readonly now: () => number;

  /**
   * @param windowSize Number of samples to keep (default: 20)
   * @param now Clock in milliseconds
   */
  constructor(windowSize: number = 20, now: () => number = Date.now) {
    this.windowSize = windowSize;
    this.now = now;
  }

  /**
   * Record a progress sample (e.g., moves played)
   */
  record(progress: number): void {
    this.samples.push({ timestamp: this.now(), progress });

    if (this.samples.length > this.windowSize) {
      this.samples.shift();
    }
  }

  /**
   * Progress per second over the window, or null if insufficient data
   */
  ratePerSecond(): number | null {
    if (this.samples.length < 2) {
      return null;
    }

    const first = this.samples[0]!;
    const last = this.samples[this.samples.length - 1]!;
    const timeDelta = last.timestamp - first.timestamp;
    const progressDelta = last.progress - first.progress;

    if (progressDelta <= 0 || timeDelta <= 0) {
      return null;
    }

    return (progressDelta / timeDelta) * 1000;
  }

  /**
   * Estimate remaining time in milliseconds
   * @returns null if insufficient data, 0 once the total is reached
   */
  estimateRemaining(current: number, total: number): number | null {
    const rate = this.ratePerSecond();
    if (rate === null) {
      return null;
    }

    const remaining = total - current;
    if (remaining <= 0) {
      return 0;
    }

    return Math.round((remaining / rate) * 1000);
  }

  reset(): void {
    this.samples = [];
  }

  get sampleCount(): number {
    return this.samples.length;
  }
}
