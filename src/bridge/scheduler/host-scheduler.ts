import { logger } from "../../logger";
import type { HostThreadGuard } from "./host-guard";
import { Rendezvous } from "./rendezvous";

export type TaskSettlement<T> =
  | { status: "completed"; value: T }
  | { status: "failed"; error: unknown }
  | { status: "timeout"; waitedMs: number };

type TaskResult<T> = { status: "completed"; value: T } | { status: "failed"; error: unknown };

type ScheduledTask = {
  id: number;
  label: string;
  submittedAt: number;
  run: () => void;
};

export type DrainReport = {
  executed: number;
  remaining: number;
};

export type HostSchedulerOptions = {
  guard: HostThreadGuard;
  maxTasksPerTick: number;
  taskTimeoutMs: number;
};

/**
 * FIFO of work that must run on the host thread.
 *
 * Any worker may `submit`; only the host's own tick calls `drain`. Each tick runs at
 * most the tasks queued when it started (capped by `maxTasksPerTick`) in submission
 * order, so tasks queued mid-drain wait for the next tick.
 */
export class HostScheduler {
  private queue: ScheduledTask[] = [];
  private nextId = 1;
  private draining = false;
  private readonly guard: HostThreadGuard;
  private readonly maxTasksPerTick: number;
  private readonly taskTimeoutMs: number;

  constructor(options: HostSchedulerOptions) {
    this.guard = options.guard;
    this.maxTasksPerTick = options.maxTasksPerTick;
    this.taskTimeoutMs = options.taskTimeoutMs;
  }

  get pending(): number {
    return this.queue.length;
  }

  get timeoutMs(): number {
    return this.taskTimeoutMs;
  }

  /**
   * Queue `invoke` for the host thread and wait for its result.
   * On timeout the task stays queued and still runs once; its result is dropped.
   */
  async submit<T>(label: string, invoke: () => T): Promise<TaskSettlement<T>> {
    const slot = new Rendezvous<TaskResult<T>>();
    const id = this.nextId++;
    const submittedAt = Date.now();

    this.queue.push({
      id,
      label,
      submittedAt,
      run: () => {
        let result: TaskResult<T>;
        try {
          result = { status: "completed", value: invoke() };
        } catch (error) {
          result = { status: "failed", error };
        }
        if (!slot.post(result)) {
          logger.warn(
            { taskId: id, task: label, lateByMs: Date.now() - submittedAt - this.taskTimeoutMs },
            "Host task finished after its caller timed out; result discarded",
          );
        }
      },
    });

    const outcome = await slot.wait(this.taskTimeoutMs);
    if (!outcome.delivered) {
      logger.warn(
        { taskId: id, task: label, timeoutMs: this.taskTimeoutMs, queued: this.queue.length },
        "Timed out waiting for host task",
      );
      return { status: "timeout", waitedMs: Date.now() - submittedAt };
    }
    return outcome.value;
  }

  /** Called from the host tick only. */
  drain(): DrainReport {
    if (this.draining) {
      return { executed: 0, remaining: this.queue.length };
    }
    this.draining = true;
    let executed = 0;
    try {
      const budget = Math.min(this.queue.length, this.maxTasksPerTick);
      while (executed < budget) {
        const task = this.queue.shift();
        if (!task) {
          break;
        }
        executed += 1;
        this.guard.runOnHost(task.run);
      }
    } finally {
      this.draining = false;
    }
    if (executed > 0) {
      logger.trace({ executed, remaining: this.queue.length }, "Host tick drained tasks");
    }
    return { executed, remaining: this.queue.length };
  }
}
