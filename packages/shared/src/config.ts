// =============================================================================
// @dailysync/shared — Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables with sensible defaults.
// Required variables throw on missing. Optional variables fall back to
// documented defaults. SOURCES is validated as JSON.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Base URLs; the DD-MM-YYYY date key is appended to each. Order matters. */
export const DEFAULT_SOURCES = JSON.stringify({
  drishti:
    "https://www.drishtiias.com/current-affairs-news-analysis-editorials/news-analysis/",
  indianexpress: "https://indianexpress.com/about/current-affairs/",
});

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export interface SourceDefinition {
  name: string;
  baseUrl: string;
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * JSON string that parses to an ordered map of source name -> base URL.
 * Example: '{"drishti": "https://example.org/news/", "other": "https://..."}'
 */
const sourcesSchema = z.string().transform((val, ctx) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(val);
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "SOURCES must be valid JSON",
    });
    return z.NEVER;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "SOURCES must be a JSON object mapping source names to URLs",
    });
    return z.NEVER;
  }

  const sources: SourceDefinition[] = [];
  for (const [name, value] of Object.entries(parsed)) {
    if (typeof value !== "string" || !isAbsoluteUrl(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `SOURCES value for "${name}" must be an absolute URL string`,
      });
      return z.NEVER;
    }
    sources.push({ name, baseUrl: value });
  }

  if (sources.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "SOURCES must name at least one source",
    });
    return z.NEVER;
  }
  return sources;
});

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

const configSchema = z
  .object({
    // Required
    NEO4J_URI: z.string().min(1, "NEO4J_URI is required"),
    NEO4J_USER: z.string().min(1, "NEO4J_USER is required"),
    NEO4J_PASSWORD: z.string().min(1, "NEO4J_PASSWORD is required"),

    // Generation capability
    GENERATION_PROVIDER: z.enum(["gemini", "anthropic"]).default("gemini"),
    GEMINI_API_KEY: z.string().optional(),
    GEMINI_MODEL: z.string().default("gemini-2.0-flash-lite"),
    ANTHROPIC_API_KEY: z.string().optional(),
    ANTHROPIC_MODEL: z.string().default("claude-sonnet-4-20250514"),

    // Sources
    SOURCES: sourcesSchema.default(DEFAULT_SOURCES),
    SOURCE_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
    SOURCE_CACHE_DIR: z.string().min(1).default("data"),

    // Pipeline
    PIPELINE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    PIPELINE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5_000),
    REVIEW_ENABLED: booleanFlag,

    // Server
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .default("info"),
    CORS_ORIGINS: z.string().default("*"),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.GENERATION_PROVIDER === "gemini" && !cfg.GEMINI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GEMINI_API_KEY"],
        message: "GEMINI_API_KEY is required when GENERATION_PROVIDER=gemini",
      });
    }
    if (cfg.GENERATION_PROVIDER === "anthropic" && !cfg.ANTHROPIC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ANTHROPIC_API_KEY"],
        message:
          "ANTHROPIC_API_KEY is required when GENERATION_PROVIDER=anthropic",
      });
    }
  });

// ---------------------------------------------------------------------------
// Exported type
// ---------------------------------------------------------------------------

export type Config = z.infer<typeof configSchema>;

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load and validate configuration from environment variables.
 *
 * Throws a ZodError with detailed messages if any required variable is
 * missing or any value fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  return configSchema.parse(env);
}
