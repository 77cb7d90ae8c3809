import type { LiveSession } from "../host/session";
import { bridgeEvents } from "../infra/bridge-events";
import { logger, type Logger } from "../logger";
import {
  successResponse,
  toErrorResponse,
  type BridgeFailure,
  type BridgeResponse,
  type Command,
} from "./protocol";
import type { RegistrySource } from "./registry/monitor";
import type { CommandContext, HandlerEntry, ParamIssue } from "./registry/types";
import type { HostScheduler } from "./scheduler/host-scheduler";

export type DispatcherOptions = {
  registry: RegistrySource;
  scheduler: HostScheduler;
  session: LiveSession;
};

export type DispatchMeta = {
  connectionId?: number;
};

type DispatchResult =
  | { ok: true; value: unknown; message?: string }
  | { ok: false; failure: BridgeFailure };

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatParamIssues(issues: ReadonlyArray<ParamIssue>): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "params"}: ${issue.message}`)
    .join("; ");
}

function domainError(message: string): DispatchResult {
  return { ok: false, failure: { kind: "domain_error", message } };
}

/**
 * Reads the handler's return value. Outcomes are recognised by shape: a handler module
 * loaded by a later reload has its own copies of any helper classes.
 */
function interpretOutcome(type: string, value: unknown, log: Logger): DispatchResult {
  if (isThenable(value)) {
    // The response is already an error; a late rejection is only logged.
    void Promise.resolve(value).catch((error: unknown) => {
      log.warn({ err: error }, "Promise returned by a synchronous command rejected");
    });
    return domainError(
      `Command '${type}' returned a promise; host operations must complete synchronously`,
    );
  }
  if (isRecord(value) && value.ok === true && "value" in value) {
    const message = typeof value.message === "string" ? value.message : undefined;
    const result = value.value === undefined ? null : value.value;
    return message === undefined
      ? { ok: true, value: result }
      : { ok: true, value: result, message };
  }
  if (isRecord(value) && value.ok === false && isRecord(value.error)) {
    const message = value.error.message;
    return domainError(typeof message === "string" && message ? message : `Command '${type}' failed`);
  }
  return domainError(`Command '${type}' returned an invalid outcome`);
}

/**
 * Routes one decoded command to its handler. Read-only commands run on the calling
 * worker; mutating commands are handed to the host scheduler and awaited. Every
 * failure comes back as an error response.
 */
export class CommandDispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  async dispatch(command: Command, meta: DispatchMeta = {}): Promise<BridgeResponse> {
    const startedAt = Date.now();
    let classification: "read_only" | "mutating" | "unknown" = "unknown";
    let result: DispatchResult;
    try {
      const registry = await this.options.registry.refresh();
      const lookup = registry.lookup(command.type);
      if (!lookup.ok) {
        result = {
          ok: false,
          failure: { kind: "unknown_command", message: `Unknown command: ${command.type}` },
        };
      } else {
        classification = lookup.entry.classification;
        result = await this.run(lookup.entry, command);
      }
    } catch (error) {
      result = domainError(errorMessage(error));
    }

    const durationMs = Date.now() - startedAt;
    const fields = {
      command: command.type,
      classification,
      connectionId: meta.connectionId,
      durationMs,
    };
    if (result.ok) {
      logger.debug(fields, "Command completed");
    } else {
      logger.warn(
        { ...fields, errorKind: result.failure.kind, error: result.failure.message },
        "Command failed",
      );
    }
    bridgeEvents.emitDispatch({
      command: command.type,
      connectionId: meta.connectionId,
      data: {
        classification,
        status: result.ok ? "success" : "error",
        durationMs,
        ...(result.ok ? {} : { errorKind: result.failure.kind }),
      },
    });

    return result.ok
      ? successResponse(result.value, result.message)
      : toErrorResponse(result.failure);
  }

  private async run(entry: HandlerEntry, command: Command): Promise<DispatchResult> {
    const parsed = entry.parseParams(command.params);
    if (!parsed.ok) {
      return {
        ok: false,
        failure: {
          kind: "invalid_params",
          message: `Invalid parameters for ${command.type}: ${formatParamIssues(parsed.issues)}`,
        },
      };
    }

    const ctx: CommandContext = {
      commandType: command.type,
      log: logger.child({ command: command.type }),
    };
    const invoke = (): DispatchResult => {
      try {
        return interpretOutcome(
          command.type,
          entry.invoke(this.options.session, parsed.params, ctx),
          ctx.log,
        );
      } catch (error) {
        return domainError(errorMessage(error));
      }
    };

    if (entry.classification === "read_only") {
      return invoke();
    }

    const { scheduler } = this.options;
    const settlement = await scheduler.submit(command.type, invoke);
    switch (settlement.status) {
      case "completed":
        return settlement.value;
      case "failed":
        return domainError(errorMessage(settlement.error));
      case "timeout":
        return {
          ok: false,
          failure: {
            kind: "scheduling_timeout",
            message: `Timeout waiting for the host to run '${command.type}' after ${scheduler.timeoutMs} ms`,
          },
        };
    }
  }
}
