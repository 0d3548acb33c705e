import Anthropic from "@anthropic-ai/sdk";
import { logExternalCall, errorMessage, type Logger } from "../logger.js";
import { withRetry, type GenerationClient, type RetryOptions } from "./client.js";

const DEFAULT_MODEL = "claude-sonnet-4-20250514";
const MAX_TOKENS = 8000;

export interface AnthropicClientOptions {
  model?: string;
  logger?: Logger;
  retry?: RetryOptions;
}

interface ContentBlockLike {
  type: string;
  text?: string;
}

/** Joins the text blocks of a Claude response; tool/thinking blocks are ignored. */
export function messageText(message: {
  content: readonly ContentBlockLike[];
}): string {
  const parts: string[] = [];
  for (const block of message.content) {
    if (block.type === "text" && typeof block.text === "string") {
      parts.push(block.text);
    }
  }
  return parts.join("\n");
}

export function createAnthropicClient(
  apiKey: string,
  options: AnthropicClientOptions = {},
): GenerationClient {
  // The SDK's own retries are disabled so withRetry is the single policy
  const client = new Anthropic({ apiKey, maxRetries: 0 });
  const model = options.model ?? DEFAULT_MODEL;

  return {
    provider: "anthropic",
    model,
    async generate({ task, prompt, systemInstruction }) {
      const start = performance.now();
      try {
        const message = await withRetry(
          () =>
            client.messages.create({
              model,
              max_tokens: MAX_TOKENS,
              system: systemInstruction,
              messages: [{ role: "user", content: prompt }],
            }),
          options.retry,
        );
        if (options.logger) {
          logExternalCall(
            options.logger,
            "anthropic",
            `generate:${task}`,
            Math.round(performance.now() - start),
          );
        }
        return messageText(message);
      } catch (err) {
        if (options.logger) {
          logExternalCall(
            options.logger,
            "anthropic",
            `generate:${task}`,
            Math.round(performance.now() - start),
            errorMessage(err),
          );
        }
        throw err;
      }
    },
  };
}
