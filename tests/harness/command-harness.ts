import {
  buildRegistry,
  CommandDispatcher,
  formatDiagnostics,
  HostScheduler,
  HostThreadGuard,
  type BridgeResponse,
  type CommandParams,
} from "../../src/bridge";
import commandModule from "../../src/commands";
import { DEFAULT_SESSION_SEED, type SessionSeed } from "../../src/config";
import { LiveSession } from "../../src/host";

export type CommandHarness = {
  session: LiveSession;
  scheduler: HostScheduler;
  /** Dispatches one command, ticking the host until it has answered. */
  send(type: string, params?: CommandParams): Promise<BridgeResponse>;
  /** Like `send`, but returns the result and throws on an error response. */
  result(type: string, params?: CommandParams): Promise<unknown>;
  /** Like `send`, but returns the error message and throws on success. */
  error(type: string, params?: CommandParams): Promise<string>;
};

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * A session wired to the shipped command module through the real dispatcher and
 * scheduler, with the host tick driven by the test instead of a timer.
 */
export function createCommandHarness(seed: SessionSeed = DEFAULT_SESSION_SEED): CommandHarness {
  const guard = new HostThreadGuard();
  const session = new LiveSession(guard, seed);
  const scheduler = new HostScheduler({ guard, maxTasksPerTick: 32, taskTimeoutMs: 5000 });
  const { registry, diagnostics } = buildRegistry(commandModule, {
    source: "src/commands/index.ts",
    fingerprint: "harness",
    version: 1,
  });
  if (!registry) {
    throw new Error(`Command module failed to build: ${formatDiagnostics(diagnostics)}`);
  }
  const dispatcher = new CommandDispatcher({
    registry: { current: registry, refresh: async () => registry },
    scheduler,
    session,
  });

  const send = async (type: string, params: CommandParams = {}): Promise<BridgeResponse> => {
    let settled = false;
    const response = dispatcher.dispatch({ type, params });
    void response.then(
      () => {
        settled = true;
      },
      () => {
        settled = true;
      },
    );
    while (!settled) {
      scheduler.drain();
      await nextTurn();
    }
    return response;
  };

  return {
    session,
    scheduler,
    send,
    async result(type, params) {
      const response = await send(type, params);
      if (response.status === "error") {
        throw new Error(`${type} failed: ${response.message}`);
      }
      return response.result;
    },
    async error(type, params) {
      const response = await send(type, params);
      if (response.status === "success") {
        throw new Error(`${type} unexpectedly succeeded`);
      }
      return response.message;
    },
  };
}
