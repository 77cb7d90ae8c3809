export type RendezvousResult<T> = { delivered: true; value: T } | { delivered: false };

/**
 * Single-use, single-value handoff from the host tick to one waiting worker.
 *
 * The first `post` wins; later posts are rejected, as is a post arriving after the
 * waiter has timed out.
 */
export class Rendezvous<T> {
  private state: "open" | "posted" | "abandoned" = "open";
  private resolveWaiter: ((result: RendezvousResult<T>) => void) | null = null;
  private posted: RendezvousResult<T> = { delivered: false };
  private timer: NodeJS.Timeout | null = null;

  get isOpen(): boolean {
    return this.state === "open";
  }

  get isAbandoned(): boolean {
    return this.state === "abandoned";
  }

  /** Returns false when the slot already holds a value or its waiter has timed out. */
  post(value: T): boolean {
    if (this.state !== "open") {
      return false;
    }
    this.state = "posted";
    this.posted = { delivered: true, value };
    this.clearTimer();
    this.resolveWaiter?.(this.posted);
    this.resolveWaiter = null;
    return true;
  }

  wait(timeoutMs: number): Promise<RendezvousResult<T>> {
    if (this.state === "posted") {
      return Promise.resolve(this.posted);
    }
    if (this.state === "abandoned" || this.resolveWaiter) {
      return Promise.reject(new Error("Rendezvous slot already has a waiter"));
    }
    return new Promise((resolve) => {
      this.resolveWaiter = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        if (this.state !== "open") {
          return;
        }
        this.state = "abandoned";
        this.resolveWaiter = null;
        resolve({ delivered: false });
      }, timeoutMs);
    });
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
