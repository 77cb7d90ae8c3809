import { HostError } from "../../host/errors";

/**
 * Marks the span during which code runs as the host's own tick.
 *
 * Host objects call {@link HostThreadGuard.assertOnHost} before mutating, so the
 * "only the host thread mutates" rule holds structurally: a handler invoked outside
 * the scheduler's drain cannot change session state.
 */
export class HostThreadGuard {
  private depth = 0;

  get onHost(): boolean {
    return this.depth > 0;
  }

  runOnHost<T>(fn: () => T): T {
    this.depth += 1;
    try {
      return fn();
    } finally {
      this.depth -= 1;
    }
  }

  assertOnHost(operation: string): void {
    if (this.depth === 0) {
      throw new HostError(
        `${operation} mutates the session and may only run on the host thread; declare the command as mutating`,
      );
    }
  }
}
