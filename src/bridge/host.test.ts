import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import commandModule from "../commands";
import { resolveBridgeSettings } from "../config/settings";
import { BridgeClient } from "./client";
import { BridgeHost } from "./host";
import type { HostTickSource } from "./scheduler/tick-source";

class ManualTickSource implements HostTickSource {
  private onTick: (() => void) | null = null;

  get running(): boolean {
    return this.onTick !== null;
  }

  start(onTick: () => void): void {
    this.onTick = onTick;
  }

  stop(): void {
    this.onTick = null;
  }

  tick(): void {
    this.onTick?.();
  }
}

const cleanups: Array<() => Promise<void> | void> = [];

afterEach(async () => {
  for (const cleanup of cleanups.splice(0).reverse()) {
    await cleanup();
  }
});

function createHost(options: { source?: string; port?: number; tickSource?: HostTickSource } = {}) {
  const settings = resolveBridgeSettings({
    server: { host: "127.0.0.1", port: options.port ?? 0 },
    scheduler: { tickIntervalMs: 5, taskTimeoutMs: 2000 },
    ...(options.source ? { commands: { source: options.source } } : {}),
  });
  const host = new BridgeHost({
    settings,
    tickSource: options.tickSource,
    loader: async () => commandModule,
  });
  cleanups.push(() => host.stop());
  return host;
}

function createClient(port: number): BridgeClient {
  const client = new BridgeClient({ host: "127.0.0.1", port, timeoutMs: 3000 });
  cleanups.push(() => client.close());
  return client;
}

describe("BridgeHost", () => {
  it("loads commands, listens and serves mutations through the host tick", async () => {
    const host = createHost();
    const address = await host.start();

    expect(host.status()).toMatchObject({
      running: true,
      registryVersion: 1,
      commandCount: Object.keys(commandModule.commands).length,
      pendingHostTasks: 0,
    });

    const client = createClient(address.port);
    await expect(client.send("create_audio_track")).resolves.toEqual({
      status: "success",
      result: { index: 4, name: "5-Audio" },
    });
    expect(host.session.tracks).toHaveLength(5);
  });

  it("holds mutations until the host ticks", async () => {
    const ticks = new ManualTickSource();
    const host = createHost({ tickSource: ticks });
    const address = await host.start();
    const client = createClient(address.port);

    const reply = client.send("set_tempo", { tempo: 140 });
    await vi.waitFor(() => expect(host.status().pendingHostTasks).toBe(1));
    expect(host.session.tempo).toBe(120);

    ticks.tick();
    await expect(reply).resolves.toEqual({ status: "success", result: { tempo: 140 } });
  });

  it("refuses to start twice", async () => {
    const host = createHost();
    await host.start();
    await expect(host.start()).rejects.toThrow("Bridge is already running");
  });

  it("stops ticking when the port cannot be bound", async () => {
    const first = createHost();
    const { port } = await first.start();
    const ticks = new ManualTickSource();
    const second = createHost({ port, tickSource: ticks });

    await expect(second.start()).rejects.toThrow(/EADDRINUSE/);
    expect(ticks.running).toBe(false);
    expect(second.status().running).toBe(false);
  });

  it("starts without commands when the source is missing", async () => {
    const source = path.join(os.tmpdir(), "session-bridge-absent", "commands.ts");
    const host = createHost({ source });
    const address = await host.start();

    expect(host.status().registryVersion).toBe(0);
    await expect(createClient(address.port).send("get_session_info")).resolves.toEqual({
      status: "error",
      message: "Unknown command: get_session_info",
    });
  });

  it("stops listening on stop", async () => {
    const host = createHost();
    await host.start();
    await host.stop();
    expect(host.status()).toMatchObject({ running: false, address: null });
  });
});
