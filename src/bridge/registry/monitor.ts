import { createJiti } from "jiti";
import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { bridgeEvents } from "../../infra/bridge-events";
import { logger } from "../../logger";
import { buildRegistry, formatDiagnostics } from "./builder";
import { CommandRegistry } from "./registry";

const MODULE_EXTENSIONS = new Set([".ts", ".mts", ".cts", ".js", ".mjs", ".cjs"]);

/** Loads the command module from source, bypassing any module cache. */
export type ModuleLoader = (source: string) => Promise<unknown>;

export interface RegistrySource {
  readonly current: CommandRegistry;
  refresh(): Promise<CommandRegistry>;
}

export type RegistryMonitorOptions = {
  source: string;
  /** When false, the source is read once at startup and never again. */
  hotReload: boolean;
  loader?: ModuleLoader;
};

export function createModuleLoader(): ModuleLoader {
  return async (source) => {
    const jiti = createJiti(import.meta.url, {
      moduleCache: false,
      fsCache: false,
      interopDefault: true,
    });
    return jiti.import(source);
  };
}

function isModuleFile(fileName: string): boolean {
  if (!MODULE_EXTENSIONS.has(path.extname(fileName).toLowerCase())) {
    return false;
  }
  return !/\.(test|spec)\.[cm]?[jt]s$/.test(fileName) && !fileName.endsWith(".d.ts");
}

/**
 * `mtimeMs:size` of the entry file plus every sibling module it could import, hashed.
 * Throws ENOENT when the entry file itself is gone.
 */
export async function fingerprintSource(source: string): Promise<string> {
  const entry = await fs.stat(source);
  const dir = path.dirname(source);
  const parts = [`${path.basename(source)}:${entry.mtimeMs}:${entry.size}`];
  const siblings = (await fs.readdir(dir)).filter(
    (name) => name !== path.basename(source) && isModuleFile(name),
  );
  for (const name of siblings.sort()) {
    try {
      const stat = await fs.stat(path.join(dir, name));
      if (stat.isFile()) {
        parts.push(`${name}:${stat.mtimeMs}:${stat.size}`);
      }
    } catch (error) {
      // Deleted between readdir and stat; the next refresh sees the new listing.
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }
  return createHash("sha1").update(parts.join("|")).digest("hex").slice(0, 16);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Owns the active registry generation and swaps in a new one when the command source
 * changes on disk. A failed rebuild never replaces a working generation.
 */
export class RegistryMonitor implements RegistrySource {
  private active: CommandRegistry;
  private inflight: Promise<CommandRegistry> | null = null;
  private failedFingerprint: string | null = null;
  private missingWarned = false;
  private initialized = false;
  private nextVersion = 1;
  private readonly loader: ModuleLoader;

  constructor(private readonly options: RegistryMonitorOptions) {
    this.active = CommandRegistry.empty(options.source);
    this.loader = options.loader ?? createModuleLoader();
  }

  get current(): CommandRegistry {
    return this.active;
  }

  get source(): string {
    return this.options.source;
  }

  /** First load. On failure the empty generation stays active. */
  async init(): Promise<CommandRegistry> {
    return this.refresh();
  }

  /** Concurrent callers share one rebuild. */
  refresh(): Promise<CommandRegistry> {
    if (this.initialized && !this.options.hotReload) {
      return Promise.resolve(this.active);
    }
    if (!this.inflight) {
      this.inflight = this.reloadIfChanged().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async reloadIfChanged(): Promise<CommandRegistry> {
    const { source } = this.options;
    let fingerprint: string;
    try {
      fingerprint = await fingerprintSource(source);
    } catch (error) {
      this.initialized = true;
      if (isNotFound(error)) {
        if (!this.missingWarned) {
          this.missingWarned = true;
          logger.warn(
            { source, version: this.active.version },
            "Command source not found; keeping active registry",
          );
        }
      } else {
        logger.warn(
          { source, err: error },
          "Failed to read command source; keeping active registry",
        );
      }
      return this.active;
    }
    this.missingWarned = false;

    if (fingerprint === this.active.fingerprint || fingerprint === this.failedFingerprint) {
      this.initialized = true;
      return this.active;
    }

    const version = this.nextVersion;
    let failure: string | null = null;
    let next: CommandRegistry | null = null;
    try {
      const moduleExport = await this.loader(source);
      const { registry, diagnostics } = buildRegistry(moduleExport, {
        source,
        fingerprint,
        version,
      });
      for (const diag of diagnostics) {
        if (diag.level === "warn") {
          logger.warn({ source, command: diag.command }, diag.message);
        }
      }
      next = registry;
      if (!registry) {
        failure = formatDiagnostics(diagnostics);
      }
    } catch (error) {
      failure = `Failed to load command module at ${source}: ${errorMessage(error)}`;
    }
    this.initialized = true;

    if (!next) {
      this.failedFingerprint = fingerprint;
      logger.error(
        { source, fingerprint, activeVersion: this.active.version, error: failure },
        "Command registry reload failed; keeping previous registry",
      );
      bridgeEvents.emitRegistry({
        source,
        data: {
          phase: "failed",
          version: this.active.version,
          fingerprint,
          error: failure ?? "unknown error",
        },
      });
      return this.active;
    }

    const phase = this.active.version === 0 ? "loaded" : "reloaded";
    this.nextVersion += 1;
    this.failedFingerprint = null;
    this.active = next;
    logger.info(
      { source, version: next.version, fingerprint, commands: next.size },
      phase === "loaded" ? "Command registry loaded" : "Command registry reloaded",
    );
    bridgeEvents.emitRegistry({
      source,
      data: { phase, version: next.version, fingerprint, commandCount: next.size },
    });
    return next;
  }
}
