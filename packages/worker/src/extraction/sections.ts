// =============================================================================
// @dailysync/worker — Section extraction
// =============================================================================
// Splits the aggregated source text into topical sections with one model
// call. Section indices are assigned here, in response order, and are the
// only provenance key the rest of the pipeline uses.
// =============================================================================

import { z } from "zod";
import {
  ExtractedSectionSchema,
  ExtractionError,
  errorMessage,
  extractJsonPayload,
  type GenerationClient,
  type PromptLibrary,
  type Section,
} from "@dailysync/shared";

export type ExtractionOutcome =
  | { kind: "sections"; sections: Section[] }
  | { kind: "empty" };

const SectionListSchema = z.array(ExtractedSectionSchema);

export async function extractSections(
  client: GenerationClient,
  prompts: PromptLibrary,
  rawText: string,
): Promise<ExtractionOutcome> {
  const { prompt, systemInstruction } = prompts.render("sections", {
    ARTICLE: rawText,
  });

  let text: string;
  try {
    text = await client.generate({ task: "sections", prompt, systemInstruction });
  } catch (err) {
    throw new ExtractionError(`Model call failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (text.trim().length === 0) {
    throw new ExtractionError("Model returned an empty response");
  }

  let payload: unknown;
  try {
    payload = extractJsonPayload(text);
  } catch (err) {
    throw new ExtractionError(`Sections payload: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = SectionListSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ExtractionError(
      `Sections payload has the wrong shape at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "invalid"}`,
      { cause: parsed.error },
    );
  }

  if (parsed.data.length === 0) {
    return { kind: "empty" };
  }

  return {
    kind: "sections",
    sections: parsed.data.map((section, index) => ({
      index,
      title: section.title,
      content: section.content,
      importance: section.importance,
    })),
  };
}
