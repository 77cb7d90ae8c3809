#!/usr/bin/env node
import { Command } from "commander";
import { APP_VERSION } from "../version";
import { parsePort, parseTimeout } from "./options";

const program = new Command()
  .name("session-bridge")
  .description("Command bridge between automation clients and a live music session")
  .version(APP_VERSION);

program
  .command("start")
  .description("Run the bridge in the foreground against an in-process session")
  .option("-c, --config <path>", "Config file path")
  .option("-p, --port <port>", "Listen port (overrides config)", parsePort)
  .option("--host <host>", "Listen address (overrides config)")
  .action(async (options: { config?: string; port?: number; host?: string }) => {
    const { runBridge } = await import("../bridge/run");
    await runBridge({
      configPath: options.config,
      overrides: { host: options.host, port: options.port },
    });
  });

program
  .command("send <type> [params]")
  .description("Send one command to a running bridge (params parsed as JSON5)")
  .option("--host <host>", "Bridge address", "localhost")
  .option("-p, --port <port>", "Bridge port", parsePort, 9877)
  .option("-t, --timeout <ms>", "Reply timeout in milliseconds", parseTimeout)
  .option("--json", "Print the raw response")
  .action(
    async (
      type: string,
      params: string | undefined,
      options: { host?: string; port?: number; timeout?: number; json?: boolean },
    ) => {
      const { sendCommand } = await import("./commands/send");
      await sendCommand(type, params, options);
    },
  );

program
  .command("commands")
  .description("List the commands the configured command source registers")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { listCommands } = await import("./commands/commands");
    await listCommands(options);
  });

program
  .command("config")
  .description("Validate configuration")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { validateConfig } = await import("./commands/config");
    await validateConfig(options.config);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
