import net from "node:net";
import { DEFAULT_HOST, DEFAULT_PORT } from "../config/settings";
import { logger } from "../logger";
import {
  FrameDecoder,
  decodeResponse,
  encodeCommand,
  type BridgeResponse,
  type CommandParams,
} from "./protocol";

export type BridgeClientOptions = {
  host?: string;
  port?: number;
  /** Per-request bound, covering connect, send and reply. */
  timeoutMs?: number;
  maxFrameBytes?: number;
};

const DEFAULT_CLIENT_TIMEOUT_MS = 15_000;

type PendingRequest = {
  type: string;
  resolve: (response: BridgeResponse) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
};

/**
 * Controller-side connection. Connects on first use and sends one command at a time;
 * a reply that does not arrive in time drops the connection so a late reply can never
 * be read as the answer to the next command.
 */
export class BridgeClient {
  private socket: net.Socket | null = null;
  private connecting: Promise<net.Socket> | null = null;
  private decoder: FrameDecoder;
  private pending: PendingRequest | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly host: string;
  private readonly port: number;
  private readonly timeoutMs: number;
  private readonly maxFrameBytes: number;

  constructor(options: BridgeClientOptions = {}) {
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? DEFAULT_PORT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CLIENT_TIMEOUT_MS;
    this.maxFrameBytes = options.maxFrameBytes ?? 1024 * 1024;
    this.decoder = new FrameDecoder({ maxFrameBytes: this.maxFrameBytes });
  }

  get connected(): boolean {
    return this.socket !== null;
  }

  send(type: string, params: CommandParams = {}): Promise<BridgeResponse> {
    const request = this.queue.then(() => this.request(type, params));
    this.queue = request.catch(() => undefined);
    return request;
  }

  close(): void {
    this.failPending(new Error("Bridge client closed"));
    this.socket?.destroy();
    this.socket = null;
  }

  private async request(type: string, params: CommandParams): Promise<BridgeResponse> {
    const socket = await this.connect();
    return new Promise<BridgeResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.failPending(new Error(`Timed out after ${this.timeoutMs} ms waiting for '${type}'`));
        this.resetConnection();
      }, this.timeoutMs);
      this.pending = { type, resolve, reject, timer };
      socket.write(encodeCommand({ type, params }));
    });
  }

  private connect(): Promise<net.Socket> {
    if (this.socket) {
      return Promise.resolve(this.socket);
    }
    if (this.connecting) {
      return this.connecting;
    }
    this.connecting = new Promise<net.Socket>((resolve, reject) => {
      const socket = net.createConnection({ host: this.host, port: this.port });
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new Error(`Timed out connecting to ${this.host}:${this.port}`));
      }, this.timeoutMs);
      socket.once("connect", () => {
        clearTimeout(timer);
        this.attach(socket);
        resolve(socket);
      });
      socket.once("error", (error) => {
        clearTimeout(timer);
        reject(new Error(`Could not connect to ${this.host}:${this.port}: ${error.message}`));
      });
    }).finally(() => {
      this.connecting = null;
    });
    return this.connecting;
  }

  private attach(socket: net.Socket): void {
    this.socket = socket;
    this.decoder = new FrameDecoder({ maxFrameBytes: this.maxFrameBytes });
    socket.on("data", (chunk) => {
      for (const frame of this.decoder.push(chunk)) {
        const pending = this.pending;
        if (!pending) {
          logger.warn("Discarding unsolicited reply from bridge");
          continue;
        }
        this.pending = null;
        clearTimeout(pending.timer);
        if (!frame.ok) {
          pending.reject(new Error(frame.failure.message));
          continue;
        }
        try {
          pending.resolve(decodeResponse(frame.value));
        } catch (error) {
          pending.reject(error instanceof Error ? error : new Error(String(error)));
        }
      }
    });
    socket.on("error", (error) => {
      logger.debug({ err: error }, "Bridge connection error");
    });
    socket.on("close", () => {
      if (this.socket === socket) {
        this.socket = null;
      }
      this.failPending(new Error("Connection to bridge closed"));
    });
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(error);
  }

  private resetConnection(): void {
    this.socket?.destroy();
    this.socket = null;
  }
}
