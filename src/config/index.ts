export {
  loadConfig,
  parseConfigText,
  resolveConfigPath,
  expandHomePath,
  type ConfigLoadResult,
} from "./loader";
export { BridgeConfigSchema, type BridgeConfig } from "./schema";
export {
  resolveBridgeSettings,
  DEFAULT_COMMAND_SOURCE,
  DEFAULT_PORT,
  DEFAULT_SESSION_SEED,
  type BridgeSettings,
  type SeedTrack,
  type SessionSeed,
} from "./settings";
