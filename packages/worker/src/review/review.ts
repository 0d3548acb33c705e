// =============================================================================
// @dailysync/worker — Optional review pass over a section's drafts
// =============================================================================
// One model call per section checks the generated drafts against the
// section text and returns corrected drafts plus review notes. A review
// response that cannot be used leaves the drafts as they were.
// =============================================================================

import {
  GenerationError,
  ReviewPayloadSchema,
  errorMessage,
  extractJsonPayload,
  type CardDraft,
  type MindmapDraft,
  type OverallReview,
  type QuestionSetDraft,
  type ReviewNotes,
  type Section,
} from "@dailysync/shared";
import type { GeneratorDeps } from "../generators/payload.js";

export interface SectionDrafts {
  cards: CardDraft[];
  mindmap: MindmapDraft | null;
  questions: QuestionSetDraft;
}

export interface ReviewResult {
  drafts: SectionDrafts;
  notes: ReviewNotes;
}

export const UNPARSEABLE_REVIEW_NOTE = "Failed to parse review response";

function unusableReview(drafts: SectionDrafts): ReviewResult {
  return {
    drafts,
    notes: {
      issues_found: [UNPARSEABLE_REVIEW_NOTE],
      corrections_made: [],
      accuracy_score: 0,
    },
  };
}

export async function reviewSectionDrafts(
  deps: GeneratorDeps,
  section: Section,
  drafts: SectionDrafts,
): Promise<ReviewResult> {
  const draftJson = JSON.stringify(
    {
      cards: drafts.cards,
      mindmap: drafts.mindmap,
      prelims: drafts.questions.prelims,
      mains: drafts.questions.mains,
    },
    null,
    2,
  );
  const { prompt, systemInstruction } = deps.prompts.render("review", {
    SECTION_TITLE: section.title,
    SECTION_CONTENT: section.content.join("\n"),
    DRAFT: draftJson,
  });

  let text: string;
  try {
    text = await deps.client.generate({ task: "review", prompt, systemInstruction });
  } catch (err) {
    throw new GenerationError("review", `model call failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  let payload: unknown;
  try {
    payload = extractJsonPayload(text);
  } catch (err) {
    deps.logger.warn("Review response unparseable, keeping drafts", {
      section: section.index,
      error: errorMessage(err),
    });
    return unusableReview(drafts);
  }

  const parsed = ReviewPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    deps.logger.warn("Review response has the wrong shape, keeping drafts", {
      section: section.index,
      error: parsed.error.issues[0]?.message ?? "invalid",
    });
    return unusableReview(drafts);
  }

  const reviewed = parsed.data;
  return {
    drafts: {
      cards: reviewed.cards,
      // A reviewer that drops the mind map does not get to remove it
      mindmap: reviewed.mindmap ?? drafts.mindmap,
      questions: { prelims: reviewed.prelims, mains: reviewed.mains },
    },
    notes: reviewed.review_notes,
  };
}

/** Totals across sections; average_accuracy is 0 when nothing was reviewed. */
export function combineReviews(notes: ReviewNotes[]): OverallReview {
  let issues = 0;
  let corrections = 0;
  let accuracy = 0;
  for (const note of notes) {
    issues += note.issues_found.length;
    corrections += note.corrections_made.length;
    accuracy += note.accuracy_score;
  }
  return {
    total_issues: issues,
    total_corrections: corrections,
    average_accuracy: notes.length === 0 ? 0 : accuracy / notes.length,
  };
}
