import { logger } from "../logger";

declare global {
  // eslint-disable-next-line no-var
  var __sessionBridgeProcessErrorHandlersRegistered: boolean | undefined;
}

const RECOVERABLE_CODES = new Set(["ECONNRESET", "EPIPE", "ECONNABORTED", "ETIMEDOUT"]);

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** A controller dropping its socket mid-write surfaces as one of these. */
export function isRecoverableSocketError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && RECOVERABLE_CODES.has(code);
}

export function formatProcessError(err: unknown): string {
  if (err instanceof Error) {
    const code = errorCode(err);
    return code ? `${err.name} (${code}): ${err.message}` : `${err.name}: ${err.message}`;
  }
  return String(err);
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__sessionBridgeProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__sessionBridgeProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", (reason) => {
    if (isRecoverableSocketError(reason)) {
      logger.warn(
        { error: formatProcessError(reason), recoverable: true },
        "Suppressed recoverable unhandled rejection",
      );
      return;
    }
    logger.error({ error: formatProcessError(reason) }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    if (isRecoverableSocketError(error)) {
      logger.warn(
        { error: formatProcessError(error), recoverable: true },
        "Suppressed recoverable uncaught exception",
      );
      return;
    }

    logger.fatal({ error: formatProcessError(error) }, "Uncaught exception");
    process.exitCode = 1;
  });
}
