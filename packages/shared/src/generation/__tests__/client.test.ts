import { describe, it, expect, vi } from "vitest";
import { isRetryable, withRetry } from "../client.js";
import { messageText } from "../anthropic.js";
import { createGenerationClient } from "../index.js";
import { loadConfig } from "../../config.js";

class StatusError extends Error {
  constructor(readonly status: number) {
    super(`HTTP ${status}`);
  }
}

describe("isRetryable", () => {
  it.each([
    [new StatusError(429), true],
    [new StatusError(503), true],
    [new StatusError(400), false],
    [new Error("Rate limit exceeded"), true],
    [new Error("got 502 from upstream"), true],
    [new Error("invalid api key"), false],
    ["string failure", false],
  ])("%s -> %s", (error, expected) => {
    expect(isRetryable(error)).toBe(expected);
  });
});

describe("withRetry", () => {
  it("backs off exponentially on transient errors", async () => {
    const sleeps: number[] = [];
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new StatusError(429))
      .mockRejectedValueOnce(new StatusError(500))
      .mockResolvedValueOnce("ok");

    const result = await withRetry(fn, {
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    expect(result).toBe("ok");
    expect(sleeps).toEqual([1000, 2000]);
  });

  it("surfaces a permanent error immediately", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new StatusError(401));

    await expect(withRetry(fn, { sleep: async () => {} })).rejects.toThrow("HTTP 401");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after the retry budget", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new StatusError(503));

    await expect(withRetry(fn, { maxRetries: 3, sleep: async () => {} })).rejects.toThrow(
      "HTTP 503",
    );
    expect(fn).toHaveBeenCalledTimes(4);
  });
});

describe("messageText", () => {
  it("joins text blocks and skips the rest", () => {
    const text = messageText({
      content: [
        { type: "text", text: "first" },
        { type: "tool_use" },
        { type: "text", text: "second" },
      ],
    });

    expect(text).toBe("first\nsecond");
  });
});

describe("createGenerationClient", () => {
  const env = {
    NEO4J_URI: "bolt://localhost:7687",
    NEO4J_USER: "neo4j",
    NEO4J_PASSWORD: "test-secret",
  };

  it("selects the configured provider and model", () => {
    const gemini = createGenerationClient(loadConfig({ ...env, GEMINI_API_KEY: "test-key" }));
    expect([gemini.provider, gemini.model]).toEqual(["gemini", "gemini-2.0-flash-lite"]);

    const anthropic = createGenerationClient(
      loadConfig({
        ...env,
        GENERATION_PROVIDER: "anthropic",
        ANTHROPIC_API_KEY: "test-key",
        ANTHROPIC_MODEL: "claude-test",
      }),
    );
    expect([anthropic.provider, anthropic.model]).toEqual(["anthropic", "claude-test"]);
  });
});
