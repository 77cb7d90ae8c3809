import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig, parseConfigText, resolveConfigPath } from "./loader";

const HOST_KEY = "SESSION_BRIDGE_LOADER_TEST_HOST";
const ORIGINAL_HOST = process.env[HOST_KEY];
const ORIGINAL_CONFIG = process.env.SESSION_BRIDGE_CONFIG;
const tempDirs: string[] = [];

function restoreEnv(key: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
}

function writeConfig(content: string, files: Record<string, string> = {}): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "session-bridge-config-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "config.jsonc");
  fs.writeFileSync(configPath, content, "utf-8");
  for (const [name, text] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), text, "utf-8");
  }
  return configPath;
}

afterEach(() => {
  restoreEnv(HOST_KEY, ORIGINAL_HOST);
  restoreEnv("SESSION_BRIDGE_CONFIG", ORIGINAL_CONFIG);
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("parseConfigText", () => {
  it("accepts comments and trailing commas", () => {
    const text = `{
      // local development
      "server": { "port": 9001, },
      "commands": { "hotReload": false },
    }`;
    expect(parseConfigText(text)).toEqual({
      config: { server: { port: 9001 }, commands: { hotReload: false } },
    });
  });

  it("accepts an empty object", () => {
    expect(parseConfigText("{}")).toEqual({ config: {} });
  });

  it("reports JSONC syntax errors by offset", () => {
    const { config, errors } = parseConfigText('{ "server": }');
    expect(config).toBeUndefined();
    expect(errors?.[0]).toMatch(/^Invalid JSONC at offset \d+: /);
  });

  it("rejects unknown keys and out-of-range values", () => {
    expect(parseConfigText('{ "servr": {} }').errors).toEqual([
      ": Unrecognized key(s) in object: 'servr'",
    ]);
    expect(parseConfigText('{ "server": { "port": 70000 } }').errors).toEqual([
      "server.port: Number must be less than or equal to 65535",
    ]);
  });

  it("normalizes the log level", () => {
    expect(parseConfigText('{ "logging": { "level": " Debug " } }').config).toEqual({
      logging: { level: "debug" },
    });
    expect(parseConfigText('{ "logging": { "level": "loud" } }').errors).toEqual([
      "logging.level: Invalid enum value. Expected 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace', received 'loud'",
    ]);
  });

  it("substitutes environment variables before validation", () => {
    delete process.env[HOST_KEY];
    const text = `{ "server": { "host": "\${${HOST_KEY}:-127.0.0.1}" } }`;
    expect(parseConfigText(text).config).toEqual({ server: { host: "127.0.0.1" } });

    process.env[HOST_KEY] = "0.0.0.0";
    expect(parseConfigText(text).config).toEqual({ server: { host: "0.0.0.0" } });
  });
});

describe("resolveConfigPath", () => {
  it("prefers an explicit path, then SESSION_BRIDGE_CONFIG, then the home directory", () => {
    process.env.SESSION_BRIDGE_CONFIG = "/etc/session-bridge/config.jsonc";
    expect(resolveConfigPath("/srv/bridge.jsonc")).toBe("/srv/bridge.jsonc");
    expect(resolveConfigPath()).toBe("/etc/session-bridge/config.jsonc");

    delete process.env.SESSION_BRIDGE_CONFIG;
    expect(resolveConfigPath()).toBe(path.join(os.homedir(), ".session-bridge", "config.jsonc"));
    expect(resolveConfigPath("~/bridge.jsonc")).toBe(path.join(os.homedir(), "bridge.jsonc"));
  });
});

describe("loadConfig", () => {
  it("loads a file and reads a .env beside it", () => {
    delete process.env[HOST_KEY];
    const configPath = writeConfig(`{ "server": { "host": "\${${HOST_KEY}}" } }`, {
      ".env": `${HOST_KEY}=10.0.0.5\n`,
    });

    expect(loadConfig(configPath)).toEqual({
      success: true,
      config: { server: { host: "10.0.0.5" } },
      path: configPath,
      fromFile: true,
    });
  });

  it("does not let .env override variables that are already set", () => {
    process.env[HOST_KEY] = "192.168.1.20";
    const configPath = writeConfig(`{ "server": { "host": "\${${HOST_KEY}}" } }`, {
      ".env": `${HOST_KEY}=10.0.0.5\n`,
    });
    expect(loadConfig(configPath).config).toEqual({ server: { host: "192.168.1.20" } });
  });

  it("returns validation errors with the path", () => {
    const configPath = writeConfig('{ "scheduler": { "taskTimeoutMs": 0 } }');
    expect(loadConfig(configPath)).toEqual({
      success: false,
      errors: ["scheduler.taskTimeoutMs: Number must be greater than 0"],
      path: configPath,
      fromFile: true,
    });
  });

  it("fails when an explicitly requested file is missing", () => {
    const missing = path.join(os.tmpdir(), "session-bridge-missing", "config.jsonc");
    expect(loadConfig(missing)).toEqual({
      success: false,
      errors: [`Config file not found: ${missing}`],
      path: missing,
      fromFile: false,
    });
  });

  it("fails when SESSION_BRIDGE_CONFIG names a missing file", () => {
    const missing = path.join(os.tmpdir(), "session-bridge-missing", "env.jsonc");
    process.env.SESSION_BRIDGE_CONFIG = missing;
    expect(loadConfig()).toMatchObject({ success: false, path: missing });
  });
});
