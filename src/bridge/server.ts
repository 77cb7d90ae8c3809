import net, { type AddressInfo } from "node:net";
import { logger } from "../logger";
import type { CommandDispatcher } from "./dispatcher";
import {
  FrameDecoder,
  encodeResponse,
  parseCommand,
  toErrorResponse,
  type BridgeResponse,
  type DecodedFrame,
} from "./protocol";

export type BridgeServerOptions = {
  host: string;
  port: number;
  maxFrameBytes: number;
  dispatcher: CommandDispatcher;
};

const RECOVERABLE_SOCKET_CODES = new Set(["ECONNRESET", "EPIPE", "ECONNABORTED"]);

function socketErrorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

/**
 * Serves one connection. Requests are handled strictly in arrival order: each decoded
 * frame is chained behind the previous one's response.
 */
export class ConnectionWorker {
  private readonly decoder: FrameDecoder;
  private queue: Promise<void> = Promise.resolve();
  private handled = 0;

  constructor(
    readonly id: number,
    private readonly socket: net.Socket,
    private readonly options: { maxFrameBytes: number; dispatcher: CommandDispatcher },
  ) {
    this.decoder = new FrameDecoder({ maxFrameBytes: options.maxFrameBytes });
    socket.on("data", (chunk) => this.onData(chunk));
    socket.on("error", (error) => this.onError(error));
  }

  get requestsHandled(): number {
    return this.handled;
  }

  private onData(chunk: Buffer): void {
    for (const frame of this.decoder.push(chunk)) {
      this.queue = this.queue
        .then(() => this.handleFrame(frame))
        .catch((error: unknown) => {
          logger.error(
            { err: error, connectionId: this.id },
            "Connection worker failed to handle request",
          );
        });
    }
  }

  private async handleFrame(frame: DecodedFrame): Promise<void> {
    if (!frame.ok) {
      logger.warn(
        { connectionId: this.id, error: frame.failure.message },
        "Rejected malformed request",
      );
      this.reply(toErrorResponse(frame.failure));
      return;
    }
    const parsed = parseCommand(frame.value);
    if (!parsed.ok) {
      logger.warn(
        { connectionId: this.id, error: parsed.failure.message },
        "Rejected malformed request",
      );
      this.reply(toErrorResponse(parsed.failure));
      return;
    }
    const response = await this.options.dispatcher.dispatch(parsed.command, {
      connectionId: this.id,
    });
    this.handled += 1;
    this.reply(response);
  }

  private reply(response: BridgeResponse): void {
    if (this.socket.destroyed || !this.socket.writable) {
      logger.debug({ connectionId: this.id }, "Client went away before its response was sent");
      return;
    }
    this.socket.write(encodeResponse(response));
  }

  private onError(error: Error): void {
    const code = socketErrorCode(error);
    if (code && RECOVERABLE_SOCKET_CODES.has(code)) {
      logger.debug({ connectionId: this.id, code }, "Connection reset by client");
      return;
    }
    logger.warn({ connectionId: this.id, err: error }, "Connection error");
  }
}

/**
 * Accepts controller connections and gives each its own worker. Workers share only the
 * dispatcher; a failing connection never affects the others.
 */
export class BridgeServer {
  private server: net.Server | null = null;
  private readonly sockets = new Set<net.Socket>();
  private nextConnectionId = 1;

  constructor(private readonly options: BridgeServerOptions) {}

  get connectionCount(): number {
    return this.sockets.size;
  }

  get address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address : null;
  }

  async listen(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error("Bridge server is already listening");
    }
    const server = net.createServer((socket) => this.accept(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        this.server = null;
        reject(error);
      };
      server.once("error", onError);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", onError);
        resolve();
      });
    });
    server.on("error", (error) => {
      logger.error({ err: error }, "Bridge server error");
    });

    const address = this.address;
    if (!address) {
      throw new Error("Bridge server did not report a TCP address");
    }
    logger.info({ host: address.address, port: address.port }, "Bridge server listening");
    return address;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info("Bridge server stopped");
  }

  private accept(socket: net.Socket): void {
    const id = this.nextConnectionId++;
    const worker = new ConnectionWorker(id, socket, {
      maxFrameBytes: this.options.maxFrameBytes,
      dispatcher: this.options.dispatcher,
    });
    this.sockets.add(socket);
    logger.info({ connectionId: id, remote: `${socket.remoteAddress}:${socket.remotePort}` }, "Controller connected");

    socket.on("close", () => {
      this.sockets.delete(socket);
      logger.info(
        { connectionId: id, requests: worker.requestsHandled },
        "Controller disconnected",
      );
    });
  }
}
