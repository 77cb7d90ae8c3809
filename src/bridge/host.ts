import type { AddressInfo } from "node:net";
import type { BridgeSettings } from "../config/settings";
import { LiveSession } from "../host/session";
import { logger } from "../logger";
import { CommandDispatcher } from "./dispatcher";
import { RegistryMonitor, type ModuleLoader } from "./registry/monitor";
import { HostScheduler } from "./scheduler/host-scheduler";
import { HostThreadGuard } from "./scheduler/host-guard";
import { IntervalTickSource, type HostTickSource } from "./scheduler/tick-source";
import { BridgeServer } from "./server";

export type BridgeHostOptions = {
  settings: BridgeSettings;
  /** Defaults to an interval tick at `scheduler.tickIntervalMs`. */
  tickSource?: HostTickSource;
  loader?: ModuleLoader;
};

export type BridgeStatus = {
  running: boolean;
  address: AddressInfo | null;
  registryVersion: number;
  commandCount: number;
  pendingHostTasks: number;
  connections: number;
};

/**
 * Wires the session, scheduler, registry monitor, dispatcher and listener together and
 * owns their start/stop order.
 */
export class BridgeHost {
  readonly guard = new HostThreadGuard();
  readonly session: LiveSession;
  readonly scheduler: HostScheduler;
  readonly registry: RegistryMonitor;
  readonly dispatcher: CommandDispatcher;
  private readonly server: BridgeServer;
  private readonly tickSource: HostTickSource;
  private running = false;

  constructor(private readonly options: BridgeHostOptions) {
    const { settings } = options;
    this.session = new LiveSession(this.guard, settings.session);
    this.scheduler = new HostScheduler({
      guard: this.guard,
      maxTasksPerTick: settings.scheduler.maxTasksPerTick,
      taskTimeoutMs: settings.scheduler.taskTimeoutMs,
    });
    this.registry = new RegistryMonitor({
      source: settings.commands.source,
      hotReload: settings.commands.hotReload,
      loader: options.loader,
    });
    this.dispatcher = new CommandDispatcher({
      registry: this.registry,
      scheduler: this.scheduler,
      session: this.session,
    });
    this.server = new BridgeServer({
      host: settings.server.host,
      port: settings.server.port,
      maxFrameBytes: settings.server.maxFrameBytes,
      dispatcher: this.dispatcher,
    });
    this.tickSource =
      options.tickSource ?? new IntervalTickSource(settings.scheduler.tickIntervalMs);
  }

  async start(): Promise<AddressInfo> {
    if (this.running) {
      throw new Error("Bridge is already running");
    }
    const registry = await this.registry.init();
    if (registry.version === 0) {
      logger.warn(
        { source: this.registry.source },
        "Starting without commands; every request fails until the command source loads",
      );
    }
    this.tickSource.start(() => {
      this.scheduler.drain();
    });
    try {
      const address = await this.server.listen();
      this.running = true;
      return address;
    } catch (error) {
      this.tickSource.stop();
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    await this.server.close();
    this.tickSource.stop();
  }

  status(): BridgeStatus {
    return {
      running: this.running,
      address: this.server.address,
      registryVersion: this.registry.current.version,
      commandCount: this.registry.current.size,
      pendingHostTasks: this.scheduler.pending,
      connections: this.server.connectionCount,
    };
  }
}
