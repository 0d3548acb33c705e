// =============================================================================
// @dailysync/shared — Generation capability contract + transient retry
// =============================================================================

import type { GenerationTask } from "../types.js";

export interface GenerationRequest {
  task: GenerationTask;
  prompt: string;
  systemInstruction: string;
}

/**
 * Free-form text generation. Output is untrusted: callers must treat an
 * unparseable response as a normal outcome.
 */
export interface GenerationClient {
  readonly provider: string;
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}

const MAX_RETRIES = 3;
const INITIAL_DELAY_MS = 1000;
const BACKOFF_FACTOR = 2;

export function isRetryable(error: unknown): boolean {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    const status = error.status;
    if (status === 429 || (status >= 500 && status < 600)) return true;
  }
  if (error instanceof Error) {
    const msg = error.message;
    if (msg.includes("429") || msg.toLowerCase().includes("rate limit")) {
      return true;
    }
    if (/\b5\d{2}\b/.test(msg)) return true;
  }
  return false;
}

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Retries rate-limit and 5xx failures with exponential backoff. */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxRetries = options.maxRetries ?? MAX_RETRIES;
  const initialDelay = options.initialDelayMs ?? INITIAL_DELAY_MS;
  const sleep = options.sleep ?? defaultSleep;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === maxRetries || !isRetryable(error)) throw error;
      await sleep(initialDelay * BACKOFF_FACTOR ** attempt);
    }
  }
  throw lastError;
}
