import { describe, expect, it } from "vitest";
import { maskConfig } from "../src/commands/config.js";
import type { JiractlConfig } from "../src/core/config/schema.js";
import { getByPath } from "../src/core/utils/object-path.js";

function storedConfig(apiToken?: string): JiractlConfig {
  return {
    version: 1,
    auth: { server: "https://example.atlassian.net", email: "user@example.com", apiToken },
    api: { timeoutMs: 30000 },
  };
}

describe("maskConfig", () => {
  it("masks the stored token and leaves the original untouched", () => {
    const config = storedConfig("abcdefghijkl");

    const masked = maskConfig(config);

    expect(masked).toEqual({
      version: 1,
      auth: { server: "https://example.atlassian.net", email: "user@example.com", apiToken: "abcd****ijkl" },
      api: { timeoutMs: 30000 },
    });
    expect(config.auth.apiToken).toBe("abcdefghijkl");
  });

  it("keeps a missing token absent", () => {
    expect(maskConfig(storedConfig()).auth.apiToken).toBeUndefined();
  });

  it("serves dotted keys from the masked config", () => {
    const masked = maskConfig(storedConfig("test-token-value"));

    expect(getByPath(masked, "auth.apiToken")).toBe("test********alue");
    expect(getByPath(masked, "auth.server")).toBe("https://example.atlassian.net");
    expect(getByPath(masked, "auth.missing")).toBeUndefined();
  });
});
