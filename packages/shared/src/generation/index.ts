import type { Config } from "../config.js";
import type { Logger } from "../logger.js";
import type { GenerationClient } from "./client.js";
import { createAnthropicClient } from "./anthropic.js";
import { createGeminiClient } from "./gemini.js";

export {
  type GenerationClient,
  type GenerationRequest,
  type RetryOptions,
  isRetryable,
  withRetry,
} from "./client.js";
export { createGeminiClient, DEFAULT_GEMINI_MODEL } from "./gemini.js";
export { createAnthropicClient, messageText } from "./anthropic.js";

/** Builds the client for GENERATION_PROVIDER; loadConfig guarantees its key. */
export function createGenerationClient(
  config: Config,
  logger?: Logger,
): GenerationClient {
  if (config.GENERATION_PROVIDER === "anthropic") {
    return createAnthropicClient(config.ANTHROPIC_API_KEY ?? "", {
      model: config.ANTHROPIC_MODEL,
      logger,
    });
  }
  return createGeminiClient(config.GEMINI_API_KEY ?? "", {
    model: config.GEMINI_MODEL,
    logger,
  });
}
