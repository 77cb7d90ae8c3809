import { EventEmitter } from "events";

export type BridgeEventStream = "registry" | "dispatch";

export interface RegistryEvent {
  stream: "registry";
  source: string;
  data: {
    phase: "loaded" | "reloaded" | "failed";
    version: number;
    fingerprint: string;
    commandCount?: number;
    error?: string;
  };
}

export interface DispatchEvent {
  stream: "dispatch";
  command: string;
  connectionId?: number;
  data: {
    classification: "read_only" | "mutating" | "unknown";
    status: "success" | "error";
    durationMs: number;
    errorKind?: string;
  };
}

export type BridgeEvent = RegistryEvent | DispatchEvent;

class BridgeEventEmitter extends EventEmitter {
  private static instance: BridgeEventEmitter;

  static getInstance(): BridgeEventEmitter {
    if (!BridgeEventEmitter.instance) {
      BridgeEventEmitter.instance = new BridgeEventEmitter();
    }
    return BridgeEventEmitter.instance;
  }

  emitRegistry(event: Omit<RegistryEvent, "stream">): void {
    const payload: RegistryEvent = { ...event, stream: "registry" };
    this.emit("bridge-event", payload);
  }

  emitDispatch(event: Omit<DispatchEvent, "stream">): void {
    const payload: DispatchEvent = { ...event, stream: "dispatch" };
    this.emit("bridge-event", payload);
  }
}

export const bridgeEvents = BridgeEventEmitter.getInstance();

export function onBridgeEvent(handler: (event: BridgeEvent) => void): () => void {
  bridgeEvents.on("bridge-event", handler);
  return () => bridgeEvents.off("bridge-event", handler);
}
