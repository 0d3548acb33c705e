import { GoogleGenAI } from "@google/genai";
import { logExternalCall, errorMessage, type Logger } from "../logger.js";
import { withRetry, type GenerationClient, type RetryOptions } from "./client.js";

export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash-lite";

export interface GeminiClientOptions {
  model?: string;
  logger?: Logger;
  retry?: RetryOptions;
}

export function createGeminiClient(
  apiKey: string,
  options: GeminiClientOptions = {},
): GenerationClient {
  const ai = new GoogleGenAI({ apiKey });
  const model = options.model ?? DEFAULT_GEMINI_MODEL;

  return {
    provider: "gemini",
    model,
    async generate({ task, prompt, systemInstruction }) {
      const start = performance.now();
      try {
        const response = await withRetry(
          () =>
            ai.models.generateContent({
              model,
              contents: prompt,
              config: { systemInstruction },
            }),
          options.retry,
        );
        if (options.logger) {
          logExternalCall(
            options.logger,
            "gemini",
            `generate:${task}`,
            Math.round(performance.now() - start),
          );
        }
        return response.text ?? "";
      } catch (err) {
        if (options.logger) {
          logExternalCall(
            options.logger,
            "gemini",
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
