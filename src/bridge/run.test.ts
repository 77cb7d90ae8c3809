import { describe, expect, it } from "vitest";
import { resolveBridgeSettings } from "../config/settings";
import { applyServerOverrides } from "./run";

describe("applyServerOverrides", () => {
  const settings = resolveBridgeSettings({ server: { host: "127.0.0.1", port: 9100 } });

  it("replaces only the given fields", () => {
    expect(applyServerOverrides(settings, { port: 9200 }).server).toEqual({
      host: "127.0.0.1",
      port: 9200,
      maxFrameBytes: 1024 * 1024,
    });
    expect(applyServerOverrides(settings, { host: "0.0.0.0" }).server.port).toBe(9100);
  });

  it("keeps port 0 for an ephemeral port", () => {
    expect(applyServerOverrides(settings, { port: 0 }).server.port).toBe(0);
  });

  it("returns the settings unchanged without overrides", () => {
    expect(applyServerOverrides(settings)).toEqual(settings);
  });
});
