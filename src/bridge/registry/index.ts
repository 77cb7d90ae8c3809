export { CommandRegistry, type CommandLookup, type CommandSummary } from "./registry";
export {
  buildRegistry,
  formatDiagnostics,
  resolveModuleExport,
  validateCommandName,
} from "./builder";
export { defineCommand, defineCommandModule, fail, ok } from "./define";
export {
  RegistryMonitor,
  createModuleLoader,
  fingerprintSource,
  type ModuleLoader,
  type RegistryMonitorOptions,
  type RegistrySource,
} from "./monitor";
export type {
  CommandClassification,
  CommandContext,
  CommandDefinition,
  CommandModule,
  CommandOutcome,
  HandlerEntry,
  ParamIssue,
  ParamSchema,
  ParsedParams,
  RegistryDiagnostic,
  RegistryMeta,
} from "./types";
