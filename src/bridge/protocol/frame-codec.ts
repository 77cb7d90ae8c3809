import { StringDecoder } from "node:string_decoder";
import {
  BridgeResponseSchema,
  type BridgeFailure,
  type BridgeResponse,
  type Command,
} from "./types";

export type DecodedFrame = { ok: true; value: unknown } | { ok: false; failure: BridgeFailure };

export type FrameDecoderOptions = {
  /** Upper bound, in UTF-8 bytes, on buffered text that has not yet formed a complete unit. */
  maxFrameBytes: number;
};

const LEADING_WHITESPACE = /^[ \t\n\r]+/;
const LITERAL_TOKEN = /^[^ \t\n\r{}[\]"]+/;
const LITERAL_END = /[ \t\n\r{}[\]"]/;
const NUMBER_PREFIX = /^-?\d*(\.\d*)?([eE][+-]?\d*)?$/;
const KEYWORDS = ["true", "false", "null"];

function malformed(message: string): { ok: false; failure: BridgeFailure } {
  return { ok: false, failure: { kind: "malformed_request", message } };
}

function couldBecomeLiteral(token: string): boolean {
  return NUMBER_PREFIX.test(token) || KEYWORDS.some((keyword) => keyword.startsWith(token));
}

/**
 * Splits a byte stream into top-level JSON values.
 *
 * Units carry no delimiter: an object or array ends when its brackets balance outside
 * string literals, a string at its closing quote, and a bare literal at the next
 * separator. Scan state persists between pushes, so partial reads never rescan.
 *
 * A unit that outgrows `maxFrameBytes` is reported once and the rest of it is skipped
 * as it arrives; nothing inside a rejected unit is decoded.
 */
export class FrameDecoder {
  private buffer = "";
  private readonly utf8 = new StringDecoder("utf8");
  private cursor = 0;
  private depth = 0;
  private inString = false;
  private escaped = false;
  private discarding: "structured" | "literal" | null = null;

  constructor(private readonly options: FrameDecoderOptions) {}

  get buffered(): number {
    return this.buffer.length;
  }

  push(chunk: Buffer | string): DecodedFrame[] {
    const text = typeof chunk === "string" ? chunk : this.utf8.write(chunk);
    const rest = this.discarding ? this.skipRejected(text) : text;
    if (rest === null) {
      return [];
    }
    this.buffer += rest;
    const frames: DecodedFrame[] = [];
    for (let frame = this.next(); frame; frame = this.next()) {
      frames.push(frame);
    }
    const size = Buffer.byteLength(this.buffer, "utf8");
    if (size > this.options.maxFrameBytes) {
      this.reject();
      frames.push(
        malformed(
          `Malformed request: ${size} bytes buffered without a complete JSON value (limit ${this.options.maxFrameBytes})`,
        ),
      );
    }
    return frames;
  }

  reset(): void {
    this.buffer = "";
    this.cursor = 0;
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
    this.discarding = null;
  }

  /** Drops the buffered partial unit but keeps its scan state so its tail can be skipped. */
  private reject(): void {
    const first = this.buffer[0];
    this.discarding = first === "{" || first === "[" || first === '"' ? "structured" : "literal";
    this.buffer = "";
    this.cursor = 0;
  }

  /** Consumes text belonging to a rejected unit; returns what follows it, or null. */
  private skipRejected(text: string): string | null {
    if (this.discarding === "literal") {
      const end = LITERAL_END.exec(text);
      if (!end) {
        return null;
      }
      this.reset();
      return text.slice(end.index);
    }
    for (let i = 0; i < text.length; i++) {
      if (this.step(text.charAt(i))) {
        this.reset();
        return text.slice(i + 1);
      }
    }
    return null;
  }

  /** Advances the structured scan by one character; true when the unit closes. */
  private step(ch: string): boolean {
    if (this.inString) {
      if (this.escaped) {
        this.escaped = false;
      } else if (ch === "\\") {
        this.escaped = true;
      } else if (ch === '"') {
        this.inString = false;
        return this.depth === 0;
      }
      return false;
    }
    if (ch === '"') {
      this.inString = true;
    } else if (ch === "{" || ch === "[") {
      this.depth += 1;
    } else if (ch === "}" || ch === "]") {
      this.depth -= 1;
      return this.depth === 0;
    }
    return false;
  }

  private next(): DecodedFrame | null {
    if (this.cursor === 0) {
      this.buffer = this.buffer.replace(LEADING_WHITESPACE, "");
      if (!this.buffer) {
        return null;
      }
    }
    const first = this.buffer[0];
    if (first === "{" || first === "[" || first === '"') {
      return this.scanStructured();
    }
    return this.scanLiteral();
  }

  private scanStructured(): DecodedFrame | null {
    const text = this.buffer;
    for (let i = this.cursor; i < text.length; i++) {
      if (this.step(text.charAt(i))) {
        return this.take(i + 1);
      }
    }
    this.cursor = text.length;
    return null;
  }

  private scanLiteral(): DecodedFrame | null {
    const match = LITERAL_TOKEN.exec(this.buffer);
    if (!match) {
      // A stray closing bracket.
      return this.take(1);
    }
    const token = match[0];
    if (token.length < this.buffer.length || KEYWORDS.includes(token)) {
      return this.take(token.length);
    }
    if (couldBecomeLiteral(token)) {
      return null;
    }
    return this.take(token.length);
  }

  private take(end: number): DecodedFrame {
    const text = this.buffer.slice(0, end);
    this.buffer = this.buffer.slice(end);
    this.cursor = 0;
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
    try {
      return { ok: true, value: JSON.parse(text) };
    } catch (error) {
      return malformed(
        `Malformed request: invalid JSON (${error instanceof Error ? error.message : String(error)})`,
      );
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseCommand(
  value: unknown,
): { ok: true; command: Command } | { ok: false; failure: BridgeFailure } {
  if (!isRecord(value)) {
    return malformed("Malformed request: expected a JSON object");
  }
  const { type, params } = value;
  if (typeof type !== "string" || !type.trim()) {
    return malformed("Malformed request: missing string field 'type'");
  }
  if (params !== undefined && !isRecord(params)) {
    return malformed("Malformed request: 'params' must be an object");
  }
  return { ok: true, command: { type, params: params ?? {} } };
}

export function encodeResponse(response: BridgeResponse): string {
  return JSON.stringify(response);
}

export function encodeCommand(command: Command): string {
  return JSON.stringify(command);
}

/** Client-side validation of a decoded response value. */
export function decodeResponse(value: unknown): BridgeResponse {
  const parsed = BridgeResponseSchema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid bridge response: ${details}`);
  }
  const response = parsed.data;
  if (response.status === "error") {
    return { status: "error", message: response.message };
  }
  return response.message === undefined
    ? { status: "success", result: response.result }
    : { status: "success", result: response.result, message: response.message };
}
