import { describe, expect, it } from "vitest";
import { HostError } from "../../host/errors";
import { HostThreadGuard } from "./host-guard";

describe("HostThreadGuard", () => {
  it("rejects mutations outside a host tick", () => {
    const guard = new HostThreadGuard();
    expect(() => guard.assertOnHost("Song.setTempo")).toThrow(HostError);
    expect(() => guard.assertOnHost("Song.setTempo")).toThrow(
      "Song.setTempo mutates the session and may only run on the host thread; declare the command as mutating",
    );
  });

  it("allows mutations inside runOnHost, including nested calls", () => {
    const guard = new HostThreadGuard();
    const seen = guard.runOnHost(() => {
      guard.assertOnHost("outer");
      return guard.runOnHost(() => guard.onHost);
    });
    expect(seen).toBe(true);
    expect(guard.onHost).toBe(false);
  });

  it("leaves the host span when the work throws", () => {
    const guard = new HostThreadGuard();
    expect(() =>
      guard.runOnHost(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(guard.onHost).toBe(false);
  });
});
