import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../config.js";

const BASE_ENV = {
  NEO4J_URI: "bolt://localhost:7687",
  NEO4J_USER: "neo4j",
  NEO4J_PASSWORD: "test-secret",
  GEMINI_API_KEY: "test-key",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(BASE_ENV);

    expect(config.GENERATION_PROVIDER).toBe("gemini");
    expect(config.GEMINI_MODEL).toBe("gemini-2.0-flash-lite");
    expect(config.PORT).toBe(3000);
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.PIPELINE_MAX_ATTEMPTS).toBe(3);
    expect(config.PIPELINE_RETRY_DELAY_MS).toBe(5000);
    expect(config.SOURCE_TIMEOUT_MS).toBe(10000);
    expect(config.SOURCE_CACHE_DIR).toBe("data");
    expect(config.REVIEW_ENABLED).toBe(false);
    expect(config.SOURCES.map((s) => s.name)).toEqual(["drishti", "indianexpress"]);
  });

  it("coerces numeric and boolean variables", () => {
    const config = loadConfig({
      ...BASE_ENV,
      PORT: "8080",
      PIPELINE_MAX_ATTEMPTS: "5",
      REVIEW_ENABLED: "true",
    });

    expect(config.PORT).toBe(8080);
    expect(config.PIPELINE_MAX_ATTEMPTS).toBe(5);
    expect(config.REVIEW_ENABLED).toBe(true);
  });

  it("parses SOURCES in declared order", () => {
    const config = loadConfig({
      ...BASE_ENV,
      SOURCES: '{"zeta": "https://z.example/", "alpha": "https://a.example/"}',
    });

    expect(config.SOURCES).toEqual([
      { name: "zeta", baseUrl: "https://z.example/" },
      { name: "alpha", baseUrl: "https://a.example/" },
    ]);
  });

  it.each([
    ["not json", "SOURCES must be valid JSON"],
    ['["https://a.example/"]', "SOURCES must be a JSON object mapping source names to URLs"],
    ['{"a": "relative/path"}', "must be an absolute URL string"],
    ["{}", "SOURCES must name at least one source"],
  ])("rejects SOURCES=%s", (value, message) => {
    expect(() => loadConfig({ ...BASE_ENV, SOURCES: value })).toThrow(message);
  });

  it("requires the Neo4j credentials", () => {
    const { NEO4J_PASSWORD: _omitted, ...env } = BASE_ENV;
    expect(() => loadConfig(env)).toThrow(ZodError);
  });

  it("requires the key of the selected provider", () => {
    expect(() =>
      loadConfig({ ...BASE_ENV, GENERATION_PROVIDER: "anthropic" }),
    ).toThrow("ANTHROPIC_API_KEY is required when GENERATION_PROVIDER=anthropic");

    const config = loadConfig({
      ...BASE_ENV,
      GEMINI_API_KEY: undefined,
      GENERATION_PROVIDER: "anthropic",
      ANTHROPIC_API_KEY: "test-key",
    });
    expect(config.ANTHROPIC_MODEL).toBe("claude-sonnet-4-20250514");
  });
});
