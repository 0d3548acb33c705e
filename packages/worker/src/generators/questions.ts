import {
  GenerationError,
  MainsQuestionDraftSchema,
  PrelimsQuestionDraftSchema,
  QuestionPayloadSchema,
  type QuestionSetDraft,
} from "@dailysync/shared";
import {
  logWarnings,
  requestPayload,
  validateItems,
  type GeneratorDeps,
} from "./payload.js";

/** Prelims (multiple choice) and mains (descriptive) questions for a section. */
export async function generateQuestions(
  deps: GeneratorDeps,
  sectionText: string,
): Promise<QuestionSetDraft> {
  const payload = await requestPayload(deps, "questions", {
    CONTENT: sectionText,
  });
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    throw new GenerationError("questions", "payload is not a JSON object");
  }

  const top = QuestionPayloadSchema.safeParse(payload);
  if (!top.success) {
    throw new GenerationError(
      "questions",
      `payload has no prelims/mains lists: ${top.error.issues[0]?.message ?? "invalid"}`,
    );
  }

  const prelims = validateItems(
    top.data.prelims,
    "Prelims question",
    PrelimsQuestionDraftSchema,
  );
  const mains = validateItems(
    top.data.mains,
    "Mains question",
    MainsQuestionDraftSchema,
  );
  logWarnings(deps.logger, "questions", [...prelims.warnings, ...mains.warnings]);

  return { prelims: prelims.items, mains: mains.items };
}
