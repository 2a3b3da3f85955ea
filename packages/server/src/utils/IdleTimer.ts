export interface IdleTimerConfig {
  /** Milliseconds of silence before the timeout fires */
  timeoutMs: number;
  /** Callback to invoke when the timeout fires */
  onTimeout: () => void;
}

/**
 * One-shot read timeout that is pushed back every time activity is recorded.
 */
export class IdleTimer {
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly config: IdleTimerConfig) {}

  /**
   * Arm the timer, discarding any pending deadline.
   */
  start(): void {
    this.stop();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.config.onTimeout();
    }, this.config.timeoutMs);
  }

  /**
   * Record that activity has occurred (e.g., a complete frame was received).
   */
  recordActivity(): void {
    if (this.timer) {
      this.start();
    }
  }

  /**
   * Cancel the pending deadline.
   */
  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }
}
