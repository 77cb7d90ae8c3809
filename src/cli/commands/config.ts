import pc from "picocolors";
import { loadConfig } from "../../config/loader";
import { resolveBridgeSettings } from "../../config/settings";

export async function validateConfig(configPath?: string) {
  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    console.error(pc.red("Config check failed. Invalid config file:"));
    for (const error of result.errors ?? []) {
      console.error(`- ${error}`);
    }
    process.exit(1);
  }

  const settings = resolveBridgeSettings(result.config, result.fromFile ? result.path : undefined);
  console.log(
    pc.green(
      result.fromFile
        ? `Config check passed: ${result.path}`
        : `No config file at ${result.path}; using defaults`,
    ),
  );
  console.log(`  listen:    ${settings.server.host}:${settings.server.port}`);
  console.log(
    `  scheduler: tick ${settings.scheduler.tickIntervalMs} ms, ` +
      `${settings.scheduler.maxTasksPerTick} tasks/tick, ` +
      `timeout ${settings.scheduler.taskTimeoutMs} ms`,
  );
  console.log(
    `  commands:  ${settings.commands.source} (hot reload ${settings.commands.hotReload ? "on" : "off"})`,
  );
}
