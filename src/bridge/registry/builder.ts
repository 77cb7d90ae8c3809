import type { LiveSession } from "../../host/session";
import { CommandRegistry } from "./registry";
import type {
  CommandClassification,
  CommandContext,
  HandlerEntry,
  ParamIssue,
  ParsedParams,
  RegistryDiagnostic,
  RegistryMeta,
} from "./types";

const COMMAND_NAME = /^[a-z][a-z0-9_]*$/;

type Callable = (...args: unknown[]) => unknown;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isCallable(value: unknown): value is Callable {
  return typeof value === "function";
}

export function resolveModuleExport(moduleExport: unknown): unknown {
  if (isRecord(moduleExport) && "default" in moduleExport) {
    return moduleExport.default;
  }
  return moduleExport;
}

export function validateCommandName(name: string): string | null {
  if (!name) {
    return "command name cannot be empty";
  }
  if (!COMMAND_NAME.test(name)) {
    return "command name must start with a lowercase letter and contain only lowercase letters, digits, and underscores";
  }
  return null;
}

function readIssues(error: unknown): ParamIssue[] {
  if (!isRecord(error) || !Array.isArray(error.issues)) {
    return [];
  }
  const issues: ParamIssue[] = [];
  for (const issue of error.issues) {
    if (!isRecord(issue)) {
      continue;
    }
    const path = Array.isArray(issue.path)
      ? issue.path.filter(
          (segment): segment is string | number =>
            typeof segment === "string" || typeof segment === "number",
        )
      : [];
    const message = typeof issue.message === "string" ? issue.message : "Invalid value";
    issues.push({ path, message });
  }
  return issues;
}

function createParamParser(
  schema: Callable | null,
  owner: unknown,
): (raw: unknown) => ParsedParams {
  if (!schema) {
    return (raw) => ({ ok: true, params: raw });
  }
  return (raw) => {
    const result: unknown = schema.call(owner, raw);
    if (isRecord(result) && result.success === true) {
      return { ok: true, params: result.data };
    }
    const issues = isRecord(result) ? readIssues(result.error) : [];
    return {
      ok: false,
      issues: issues.length > 0 ? issues : [{ path: [], message: "Validation failed" }],
    };
  };
}

function buildEntry(params: {
  type: string;
  definition: Record<string, unknown>;
  classification: CommandClassification;
  diagnostics: RegistryDiagnostic[];
}): HandlerEntry | null {
  const { type, definition, classification, diagnostics } = params;
  const run = definition.run;
  if (!isCallable(run)) {
    diagnostics.push({
      command: type,
      level: "error",
      message: `Command "${type}" is missing run function`,
    });
    return null;
  }

  let safeParse: Callable | null = null;
  const schema = definition.params;
  if (schema !== undefined) {
    const candidate = isRecord(schema) ? schema.safeParse : undefined;
    if (!isCallable(candidate)) {
      diagnostics.push({
        command: type,
        level: "error",
        message: `Command "${type}" params schema does not expose safeParse`,
      });
      return null;
    }
    safeParse = candidate;
  }

  const description = definition.description;
  if (description !== undefined && typeof description !== "string") {
    diagnostics.push({
      command: type,
      level: "warn",
      message: `Command "${type}" description is not a string; ignored`,
    });
  }

  return {
    type,
    classification,
    ...(typeof description === "string" && description ? { description } : {}),
    parseParams: createParamParser(safeParse, schema),
    invoke: (session: LiveSession, parsed: unknown, ctx: CommandContext) =>
      run.call(definition, session, parsed, ctx),
  };
}

/**
 * Validate a loaded command module and build a registry generation from it.
 * Any error diagnostic means no registry: a half-valid module is never published.
 */
export function buildRegistry(
  moduleExport: unknown,
  meta: RegistryMeta,
): { registry: CommandRegistry | null; diagnostics: RegistryDiagnostic[] } {
  const diagnostics: RegistryDiagnostic[] = [];
  const raw = resolveModuleExport(moduleExport);

  if (!isRecord(raw)) {
    diagnostics.push({
      command: "*",
      level: "error",
      message: `Invalid command module from ${meta.source}: not an object`,
    });
    return { registry: null, diagnostics };
  }

  if (!isRecord(raw.commands)) {
    diagnostics.push({
      command: "*",
      level: "error",
      message: `Command module from ${meta.source} is missing required field: commands`,
    });
    return { registry: null, diagnostics };
  }

  const mutating = new Set<string>();
  if (raw.mutating !== undefined) {
    if (!Array.isArray(raw.mutating)) {
      diagnostics.push({
        command: "*",
        level: "error",
        message: `Command module from ${meta.source} has invalid field: mutating must be an array of command names`,
      });
      return { registry: null, diagnostics };
    }
    for (const name of raw.mutating) {
      if (typeof name !== "string") {
        diagnostics.push({
          command: "*",
          level: "error",
          message: `Command module from ${meta.source} lists a non-string mutating entry`,
        });
        continue;
      }
      if (mutating.has(name)) {
        diagnostics.push({
          command: name,
          level: "warn",
          message: `Command "${name}" is listed as mutating more than once`,
        });
      }
      mutating.add(name);
    }
  }

  const entries: HandlerEntry[] = [];
  for (const [type, definition] of Object.entries(raw.commands)) {
    const nameError = validateCommandName(type);
    if (nameError) {
      diagnostics.push({
        command: type,
        level: "error",
        message: `Invalid command "${type}": ${nameError}`,
      });
      continue;
    }
    if (!isRecord(definition)) {
      diagnostics.push({
        command: type,
        level: "error",
        message: `Command "${type}" definition is not an object`,
      });
      continue;
    }
    const entry = buildEntry({
      type,
      definition,
      classification: mutating.has(type) ? "mutating" : "read_only",
      diagnostics,
    });
    if (entry) {
      entries.push(entry);
    }
  }

  for (const name of mutating) {
    if (!Object.hasOwn(raw.commands, name)) {
      diagnostics.push({
        command: name,
        level: "error",
        message: `Command "${name}" is declared mutating but is not registered`,
      });
    }
  }

  if (diagnostics.some((diag) => diag.level === "error")) {
    return { registry: null, diagnostics };
  }
  return { registry: new CommandRegistry(meta, entries), diagnostics };
}

export function formatDiagnostics(diagnostics: readonly RegistryDiagnostic[]): string {
  return diagnostics
    .filter((diag) => diag.level === "error")
    .map((diag) => diag.message)
    .join("; ");
}
