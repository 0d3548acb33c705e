// =============================================================================
// @dailysync/worker — Shared plumbing for artifact generators
// =============================================================================

import type { z } from "zod";
import {
  GenerationError,
  PayloadParseError,
  errorMessage,
  extractJsonPayload,
  type GenerationClient,
  type GenerationTask,
  type Logger,
  type PromptLibrary,
} from "@dailysync/shared";

export interface GeneratorDeps {
  client: GenerationClient;
  prompts: PromptLibrary;
  logger: Logger;
}

/**
 * Renders the task prompt, calls the model and locates the JSON payload.
 * Call failures and unparseable responses both become GenerationError.
 */
export async function requestPayload(
  deps: GeneratorDeps,
  task: GenerationTask,
  vars: Record<string, string>,
): Promise<unknown> {
  const { prompt, systemInstruction } = deps.prompts.render(task, vars);

  let text: string;
  try {
    text = await deps.client.generate({ task, prompt, systemInstruction });
  } catch (err) {
    throw new GenerationError(task, `model call failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  try {
    return extractJsonPayload(text);
  } catch (err) {
    if (err instanceof PayloadParseError) {
      throw new GenerationError(task, err.message, { cause: err });
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Item validation (two-layer Zod)
// ---------------------------------------------------------------------------

export interface ValidatedItems<T> {
  items: T[];
  warnings: string[];
}

type ItemSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Validates each raw item against `strict`, then `lenient` when given.
 * Items failing every layer are dropped with a warning.
 */
export function validateItems<T>(
  rawItems: unknown[],
  label: string,
  strict: ItemSchema<T>,
  lenient?: ItemSchema<T>,
): ValidatedItems<T> {
  const items: T[] = [];
  const warnings: string[] = [];

  for (let i = 0; i < rawItems.length; i++) {
    const raw = rawItems[i];

    const first = strict.safeParse(raw);
    if (first.success) {
      items.push(first.data);
      continue;
    }

    if (lenient) {
      const second = lenient.safeParse(raw);
      if (second.success) {
        warnings.push(`${label} ${i}: accepted by lenient validation only`);
        items.push(second.data);
        continue;
      }
    }

    warnings.push(`${label} ${i}: skipped (${first.error.issues[0]?.message ?? "invalid"})`);
  }

  return { items, warnings };
}

export function logWarnings(
  logger: Logger,
  task: GenerationTask,
  warnings: string[],
): void {
  for (const warning of warnings) {
    logger.warn("Generator item warning", { task, warning });
  }
}
