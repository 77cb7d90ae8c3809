import { logger } from "../../logger";

/** The host's periodic callback. The bridge never decides when the host ticks. */
export interface HostTickSource {
  start(onTick: () => void): void;
  stop(): void;
}

/**
 * Ticks on a fixed interval, standing in for the host's idle callback when the bridge
 * owns the session.
 */
export class IntervalTickSource implements HostTickSource {
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly intervalMs: number) {}

  start(onTick: () => void): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      try {
        onTick();
      } catch (error) {
        logger.error({ err: error }, "Host tick failed");
      }
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
