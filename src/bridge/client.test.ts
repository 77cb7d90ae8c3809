import net from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { BridgeClient } from "./client";
import { FrameDecoder } from "./protocol";

type FakeBridge = {
  port: number;
  received: unknown[];
};

const cleanups: Array<() => Promise<void> | void> = [];

afterEach(async () => {
  for (const cleanup of cleanups.splice(0).reverse()) {
    await cleanup();
  }
});

/** A stand-in bridge whose reply to each request is chosen by `respond`. */
async function startFakeBridge(
  respond: (request: unknown, socket: net.Socket) => void,
): Promise<FakeBridge> {
  const received: unknown[] = [];
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    const decoder = new FrameDecoder({ maxFrameBytes: 64 * 1024 });
    socket.on("data", (chunk: Buffer) => {
      for (const frame of decoder.push(chunk)) {
        const request = frame.ok ? frame.value : null;
        received.push(request);
        respond(request, socket);
      }
    });
    socket.on("error", () => undefined);
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("fake bridge has no TCP address");
  }
  cleanups.push(
    () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) {
          socket.destroy();
        }
        server.close(() => resolve());
      }),
  );
  return { port: address.port, received };
}

function createClient(port: number, timeoutMs = 2000): BridgeClient {
  const client = new BridgeClient({ host: "127.0.0.1", port, timeoutMs });
  cleanups.push(() => client.close());
  return client;
}

function echoType(request: unknown, socket: net.Socket): void {
  const type =
    typeof request === "object" && request !== null && "type" in request ? request.type : null;
  socket.write(JSON.stringify({ status: "success", result: { type } }));
}

describe("BridgeClient", () => {
  it("sends the command with its params and returns the reply", async () => {
    const bridge = await startFakeBridge(echoType);
    const client = createClient(bridge.port);

    await expect(client.send("set_tempo", { tempo: 110 })).resolves.toEqual({
      status: "success",
      result: { type: "set_tempo" },
    });
    expect(bridge.received).toEqual([{ type: "set_tempo", params: { tempo: 110 } }]);
    expect(client.connected).toBe(true);
  });

  it("sends one command at a time over one connection", async () => {
    const bridge = await startFakeBridge(echoType);
    const client = createClient(bridge.port);

    const replies = await Promise.all([
      client.send("first"),
      client.send("second"),
      client.send("third"),
    ]);

    expect(replies.map((reply) => (reply.status === "success" ? reply.result : null))).toEqual([
      { type: "first" },
      { type: "second" },
      { type: "third" },
    ]);
    expect(bridge.received).toHaveLength(3);
  });

  it("returns error responses as values", async () => {
    const bridge = await startFakeBridge((_request, socket) => {
      socket.write('{"status":"error","message":"Unknown command: x"}');
    });
    await expect(createClient(bridge.port).send("x")).resolves.toEqual({
      status: "error",
      message: "Unknown command: x",
    });
  });

  it("times out and drops the connection when no reply arrives", async () => {
    const bridge = await startFakeBridge(() => undefined);
    const client = createClient(bridge.port, 50);

    await expect(client.send("get_session_info")).rejects.toThrow(
      "Timed out after 50 ms waiting for 'get_session_info'",
    );
    expect(client.connected).toBe(false);
  });

  it("rejects a reply that is not a bridge response", async () => {
    const bridge = await startFakeBridge((_request, socket) => {
      socket.write('{"status":"maybe"}');
    });
    await expect(createClient(bridge.port).send("get_session_info")).rejects.toThrow(
      /^Invalid bridge response: /,
    );
  });

  it("fails the pending request when the bridge hangs up", async () => {
    const bridge = await startFakeBridge((_request, socket) => {
      socket.end();
    });
    await expect(createClient(bridge.port).send("get_session_info")).rejects.toThrow(
      "Connection to bridge closed",
    );
  });

  it("reports a bridge that is not listening", async () => {
    const bridge = await startFakeBridge(() => undefined);
    const port = bridge.port;
    for (const cleanup of cleanups.splice(0)) {
      await cleanup();
    }
    await expect(createClient(port).send("get_session_info")).rejects.toThrow(
      `Could not connect to 127.0.0.1:${port}`,
    );
  });

  it("fails the pending request on close", async () => {
    const bridge = await startFakeBridge(() => undefined);
    const client = createClient(bridge.port);
    const pending = client.send("get_session_info");
    // Let the connection open and the request go out.
    await new Promise((resolve) => setTimeout(resolve, 50));
    client.close();
    await expect(pending).rejects.toThrow("Bridge client closed");
  });
});
