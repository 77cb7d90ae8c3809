import pc from "picocolors";
import { loadConfig } from "../../config/loader";
import { resolveBridgeSettings } from "../../config/settings";
import { buildRegistry } from "../../bridge/registry/builder";
import {
  createModuleLoader,
  fingerprintSource,
  type ModuleLoader,
} from "../../bridge/registry/monitor";
import type { CommandRegistry } from "../../bridge/registry/registry";
import type { RegistryDiagnostic } from "../../bridge/registry/types";

export type CommandSourceReport = {
  source: string;
  registry: CommandRegistry | null;
  diagnostics: RegistryDiagnostic[];
};

/** Loads and validates a command source once, without starting a bridge. */
export async function inspectCommandSource(
  source: string,
  loader: ModuleLoader = createModuleLoader(),
): Promise<CommandSourceReport> {
  try {
    const fingerprint = await fingerprintSource(source);
    const moduleExport = await loader(source);
    const { registry, diagnostics } = buildRegistry(moduleExport, {
      source,
      fingerprint,
      version: 1,
    });
    return { source, registry, diagnostics };
  } catch (error) {
    return {
      source,
      registry: null,
      diagnostics: [
        {
          command: "*",
          level: "error",
          message: `Failed to load command module at ${source}: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }
}

function formatDiagnosticLevel(level: RegistryDiagnostic["level"]): string {
  switch (level) {
    case "error":
      return pc.red("ERROR");
    case "warn":
      return pc.yellow("WARN");
  }
}

export async function listCommands(options: { config?: string }): Promise<void> {
  const configResult = loadConfig(options.config);
  if (!configResult.success || !configResult.config) {
    console.error(pc.red("Failed to load configuration:"));
    for (const err of configResult.errors ?? []) {
      console.error(`  ${err}`);
    }
    process.exit(1);
  }
  const settings = resolveBridgeSettings(
    configResult.config,
    configResult.fromFile ? configResult.path : undefined,
  );
  const report = await inspectCommandSource(settings.commands.source);

  console.log(pc.bold(`Commands from ${report.source}:`));
  console.log("");
  if (report.registry) {
    for (const command of report.registry.list()) {
      const kind =
        command.classification === "mutating" ? pc.yellow("mutating") : pc.green("read-only");
      console.log(`  ${pc.cyan(command.type)} [${kind}]`);
      if (command.description) {
        console.log(`    ${pc.gray(command.description)}`);
      }
    }
    console.log("");
    console.log(`${report.registry.size} commands`);
  }

  if (report.diagnostics.length > 0) {
    console.log("");
    console.log(pc.bold("Diagnostics:"));
    for (const diag of report.diagnostics) {
      console.log(`  ${formatDiagnosticLevel(diag.level)} ${diag.command}: ${diag.message}`);
    }
  }
  if (!report.registry) {
    process.exitCode = 1;
  }
}
