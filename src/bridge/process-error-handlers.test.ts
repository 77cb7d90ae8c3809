import { describe, expect, it } from "vitest";
import { formatProcessError, isRecoverableSocketError } from "./process-error-handlers";

function socketError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("isRecoverableSocketError", () => {
  it.each(["ECONNRESET", "EPIPE", "ECONNABORTED", "ETIMEDOUT"])(
    "treats %s as recoverable",
    (code) => {
      expect(isRecoverableSocketError(socketError(code, "socket gone"))).toBe(true);
    },
  );

  it("does not recover from other failures", () => {
    expect(isRecoverableSocketError(socketError("EADDRINUSE", "port taken"))).toBe(false);
    expect(isRecoverableSocketError(new Error("boom"))).toBe(false);
    expect(isRecoverableSocketError("ECONNRESET")).toBe(false);
    expect(isRecoverableSocketError({ code: 104 })).toBe(false);
  });
});

describe("formatProcessError", () => {
  it("includes the error code when there is one", () => {
    expect(formatProcessError(socketError("EPIPE", "write after end"))).toBe(
      "Error (EPIPE): write after end",
    );
    expect(formatProcessError(new TypeError("bad input"))).toBe("TypeError: bad input");
    expect(formatProcessError(42)).toBe("42");
  });
});
