import path from "node:path";
import { fileURLToPath } from "node:url";
import type { LogLevel } from "../logger";
import { expandHomePath } from "./loader";
import type { BridgeConfig } from "./schema";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 9877;
export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;

/**
 * The host drives draining at its own cadence; these bound how long one tick may run
 * and how long a worker waits for the host before reporting a timeout.
 */
export const DEFAULT_TICK_INTERVAL_MS = 50;
export const DEFAULT_MAX_TASKS_PER_TICK = 32;
export const DEFAULT_TASK_TIMEOUT_MS = 10_000;

export const DEFAULT_COMMAND_SOURCE = fileURLToPath(
  new URL("../commands/index.ts", import.meta.url),
);

export type SeedTrack = { kind: "midi" | "audio"; name?: string };

export type SessionSeed = {
  tempo: number;
  scenes: number;
  returnTracks: number;
  tracks: SeedTrack[];
};

export const DEFAULT_SESSION_SEED: SessionSeed = {
  tempo: 120,
  scenes: 8,
  returnTracks: 2,
  tracks: [{ kind: "midi" }, { kind: "midi" }, { kind: "audio" }, { kind: "audio" }],
};

export type BridgeSettings = {
  server: { host: string; port: number; maxFrameBytes: number };
  scheduler: { tickIntervalMs: number; maxTasksPerTick: number; taskTimeoutMs: number };
  commands: { source: string; hotReload: boolean };
  session: SessionSeed;
  logging: { level: LogLevel };
};

function resolveCommandSource(source: string | undefined, configPath?: string): string {
  if (!source) {
    return DEFAULT_COMMAND_SOURCE;
  }
  const expanded = expandHomePath(source);
  if (path.isAbsolute(expanded)) {
    return expanded;
  }
  const base = configPath ? path.dirname(configPath) : process.cwd();
  return path.resolve(base, expanded);
}

export function resolveBridgeSettings(config: BridgeConfig, configPath?: string): BridgeSettings {
  return {
    server: {
      host: config.server?.host ?? DEFAULT_HOST,
      port: config.server?.port ?? DEFAULT_PORT,
      maxFrameBytes: config.server?.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES,
    },
    scheduler: {
      tickIntervalMs: config.scheduler?.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS,
      maxTasksPerTick: config.scheduler?.maxTasksPerTick ?? DEFAULT_MAX_TASKS_PER_TICK,
      taskTimeoutMs: config.scheduler?.taskTimeoutMs ?? DEFAULT_TASK_TIMEOUT_MS,
    },
    commands: {
      source: resolveCommandSource(config.commands?.source, configPath),
      hotReload: config.commands?.hotReload ?? true,
    },
    session: {
      tempo: config.session?.tempo ?? DEFAULT_SESSION_SEED.tempo,
      scenes: config.session?.scenes ?? DEFAULT_SESSION_SEED.scenes,
      returnTracks: config.session?.returnTracks ?? DEFAULT_SESSION_SEED.returnTracks,
      tracks: config.session?.tracks ?? DEFAULT_SESSION_SEED.tracks,
    },
    logging: {
      level: config.logging?.level ?? "info",
    },
  };
}
