import { loadConfig } from "../config/loader";
import { resolveBridgeSettings, type BridgeSettings } from "../config/settings";
import { configureLogger, logger } from "../logger";
import { APP_VERSION } from "../version";
import { BridgeHost } from "./host";
import { registerProcessErrorHandlers } from "./process-error-handlers";

export type ServerOverrides = {
  host?: string;
  port?: number;
};

export type RunBridgeOptions = {
  configPath?: string;
  overrides?: ServerOverrides;
};

export function applyServerOverrides(
  settings: BridgeSettings,
  overrides: ServerOverrides = {},
): BridgeSettings {
  return {
    ...settings,
    server: {
      ...settings.server,
      host: overrides.host ?? settings.server.host,
      port: overrides.port ?? settings.server.port,
    },
  };
}

/** Loads configuration, starts the bridge and stops it on SIGINT/SIGTERM. */
export async function runBridge(options: RunBridgeOptions = {}): Promise<BridgeHost> {
  const result = loadConfig(options.configPath);
  if (!result.success || !result.config) {
    logger.error({ errors: result.errors, path: result.path }, "Failed to load configuration");
    process.exit(1);
  }

  const settings = applyServerOverrides(
    resolveBridgeSettings(result.config, result.fromFile ? result.path : undefined),
    options.overrides,
  );
  configureLogger(settings.logging.level);
  registerProcessErrorHandlers();

  logger.info(`
=========================================
   session-bridge v${APP_VERSION}
=========================================
   Config: ${result.fromFile ? result.path : "(defaults)"}
   Commands: ${settings.commands.source}
   Hot reload: ${settings.commands.hotReload ? "on" : "off"}
=========================================
  `);

  const bridge = new BridgeHost({ settings });
  const address = await bridge.start();
  logger.info(
    { host: address.address, port: address.port, pid: process.pid },
    "Bridge is running. Press Ctrl+C to stop.",
  );

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await bridge.stop();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }

  return bridge;
}
