import type { LiveSession } from "../../host/session";
import type { Logger } from "../../logger";

export type CommandClassification = "read_only" | "mutating";

export type CommandOutcome<T = unknown> =
  | { ok: true; value: T; message?: string }
  | { ok: false; error: { message: string } };

export type ParamIssue = {
  path: ReadonlyArray<string | number>;
  message: string;
};

/**
 * Anything exposing a zod-style `safeParse`. Command modules are reloaded in a fresh
 * module scope, so schemas are recognised by shape rather than by class.
 */
export type ParamSchema<P> = {
  safeParse(
    value: unknown,
  ):
    | { success: true; data: P }
    | { success: false; error: { issues: ReadonlyArray<ParamIssue> } };
};

export type CommandContext = {
  commandType: string;
  log: Logger;
};

export type CommandDefinition<P = Record<string, unknown>> = {
  description?: string;
  params?: ParamSchema<P>;
  run(session: LiveSession, params: P, ctx: CommandContext): CommandOutcome;
};

/** Shape of the reloadable command module's default export. */
export type CommandModule = {
  /** Commands that must run on the host thread. Everything else is read-only. */
  mutating: readonly string[];
  commands: Readonly<Record<string, CommandDefinition>>;
};

export type ParsedParams =
  | { ok: true; params: unknown }
  | { ok: false; issues: ReadonlyArray<ParamIssue> };

export type HandlerEntry = {
  type: string;
  classification: CommandClassification;
  description?: string;
  parseParams(raw: unknown): ParsedParams;
  /** Returns whatever the handler returned; the dispatcher checks it is an outcome. */
  invoke(session: LiveSession, params: unknown, ctx: CommandContext): unknown;
};

export type RegistryDiagnostic = {
  command: string;
  level: "warn" | "error";
  message: string;
};

export type RegistryMeta = {
  source: string;
  fingerprint: string;
  version: number;
};
