import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { BridgeConfigSchema, type BridgeConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: BridgeConfig;
  errors?: string[];
  path: string;
  /** False when no file existed at the default location and defaults were used. */
  fromFile: boolean;
}

export function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(expandHomePath(customPath));
  }
  const envPath = process.env.SESSION_BRIDGE_CONFIG;
  if (envPath) {
    return path.resolve(expandHomePath(envPath));
  }
  return path.join(os.homedir(), ".session-bridge", "config.jsonc");
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const configDir = path.dirname(resolvedPath);
  for (const envFile of [".env", ".env.local"]) {
    const envPath = path.join(configDir, envFile);
    if (!fs.existsSync(envPath)) {
      continue;
    }
    const result = loadDotEnv({ path: envPath, override: false });
    if (result.error) {
      throw result.error;
    }
  }
}

function formatJsoncErrors(errors: ParseError[]): string[] {
  return errors.map(
    (error) => `Invalid JSONC at offset ${error.offset}: ${printParseErrorCode(error.error)}`,
  );
}

export function parseConfigText(raw: string): { config?: BridgeConfig; errors?: string[] } {
  const parseErrors: ParseError[] = [];
  const parsed: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    return { errors: formatJsoncErrors(parseErrors) };
  }

  const result = BridgeConfigSchema.safeParse(replaceEnvVars(parsed ?? {}));
  if (!result.success) {
    return {
      errors: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }
  return { config: result.data };
}

/**
 * Load the bridge configuration. A missing file at the default location is not an error:
 * the bridge runs on built-in defaults. An explicitly requested file must exist.
 */
export function loadConfig(configPath?: string): ConfigLoadResult {
  const explicit = Boolean(configPath || process.env.SESSION_BRIDGE_CONFIG);
  const resolvedPath = resolveConfigPath(configPath);

  if (!fs.existsSync(resolvedPath)) {
    if (explicit) {
      return {
        success: false,
        errors: [`Config file not found: ${resolvedPath}`],
        path: resolvedPath,
        fromFile: false,
      };
    }
    return { success: true, config: {}, path: resolvedPath, fromFile: false };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const raw = fs.readFileSync(resolvedPath, "utf-8");
    const { config, errors } = parseConfigText(raw);
    if (!config) {
      return { success: false, errors, path: resolvedPath, fromFile: true };
    }
    return { success: true, config, path: resolvedPath, fromFile: true };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
      fromFile: true,
    };
  }
}
