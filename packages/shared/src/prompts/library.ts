// =============================================================================
// @dailysync/shared — Prompt template library
// =============================================================================
// Loads and caches prompt templates from the filesystem. Each task has a
// user prompt "<task>.txt" and a system instruction "<task>.system.txt".
// Placeholders are written {NAME} and replaced verbatim.
// =============================================================================

import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { GenerationTask } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RenderedPrompt {
  prompt: string;
  systemInstruction: string;
}

export interface PromptLibrary {
  /** Renders the user prompt and system instruction for a task. */
  render(task: GenerationTask, vars: Record<string, string>): RenderedPrompt;
  /** Template names currently loaded (without the .txt extension). */
  names(): string[];
  /** Re-reads all templates from disk. */
  reload(): void;
}

export const DEFAULT_PROMPT_DIR = fileURLToPath(
  new URL("../../prompts/", import.meta.url),
);

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

const PLACEHOLDER = /\{([A-Z_]+)\}/g;

/** Single pass: substituted values are inserted verbatim and never rescanned. */
function substitute(template: string, vars: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (token, key: string) =>
    Object.hasOwn(vars, key) ? vars[key] : token,
  );
}

export function createPromptLibrary(
  templateDir: string = DEFAULT_PROMPT_DIR,
): PromptLibrary {
  const cache = new Map<string, string>();

  function load(): void {
    cache.clear();
    const files = readdirSync(templateDir).filter((f) => f.endsWith(".txt"));
    for (const file of files) {
      const content = readFileSync(join(templateDir, file), "utf-8");
      // "cards.system.txt" -> "cards.system"
      cache.set(file.replace(/\.txt$/, ""), content.trim());
    }
  }

  function template(name: string): string {
    const found = cache.get(name);
    if (found === undefined) {
      throw new Error(`Unknown prompt template: ${name}`);
    }
    return found;
  }

  load();

  return {
    render(task, vars) {
      return {
        prompt: substitute(template(task), vars),
        systemInstruction: template(`${task}.system`),
      };
    },
    names() {
      return [...cache.keys()].sort();
    },
    reload() {
      load();
    },
  };
}
