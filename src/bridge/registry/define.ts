import type { CommandDefinition, CommandModule, CommandOutcome, ParamSchema } from "./types";

export function ok<T>(value: T, message?: string): CommandOutcome<T> {
  return message === undefined ? { ok: true, value } : { ok: true, value, message };
}

export function fail(message: string): CommandOutcome<never> {
  return { ok: false, error: { message } };
}

/** Identity helper that types `run`'s params from the schema. */
export function defineCommand<P>(
  definition: CommandDefinition<P> & { params: ParamSchema<P> },
): CommandDefinition<P> {
  return definition;
}

export function defineCommandModule(module: CommandModule): CommandModule {
  return module;
}
