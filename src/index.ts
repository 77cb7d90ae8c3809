import { runBridge } from "./bridge/run";
import { logger } from "./logger";

async function main() {
  const args = process.argv.slice(2);
  const configArgIndex = args.indexOf("--config");
  const configPath = configArgIndex >= 0 ? args[configArgIndex + 1] : undefined;

  // The listener and the interval tick keep the process alive until a signal arrives.
  await runBridge({ configPath });
}

main().catch((err) => {
  logger.error({ err }, "Fatal error during startup");
  process.exit(1);
});
