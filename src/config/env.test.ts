import { describe, expect, it } from "vitest";
import { replaceEnvVars } from "./env";

describe("replaceEnvVars", () => {
  const env = { PORT: "9001", EMPTY: "" };

  it("replaces references in nested strings", () => {
    expect(
      replaceEnvVars({ server: { host: "h-${PORT}", tags: ["${PORT}", 3] }, on: true }, env),
    ).toEqual({ server: { host: "h-9001", tags: ["9001", 3] }, on: true });
  });

  it("uses the fallback for unset or empty variables", () => {
    expect(replaceEnvVars("${MISSING:-localhost}", env)).toBe("localhost");
    expect(replaceEnvVars("${EMPTY:-localhost}", env)).toBe("localhost");
    expect(replaceEnvVars("${PORT:-1}", env)).toBe("9001");
  });

  it("leaves unset references without a fallback as written", () => {
    expect(replaceEnvVars("${MISSING}", env)).toBe("${MISSING}");
    expect(replaceEnvVars("${EMPTY}", env)).toBe("");
  });
});
