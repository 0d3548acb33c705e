// =============================================================================
// @dailysync/shared — Zod schemas for model payloads and stored documents
// =============================================================================
// Model payloads go through two layers where the artifact allows it: a
// strict schema matching the prompt's output format, then a lenient one that
// normalises common deviations. Object schemas strip unknown keys, so a
// model-reported section_index never reaches an artifact.
// =============================================================================

import { z } from "zod";
import { isDateKey } from "./date-key.js";
import type {
  Card,
  CardDraft,
  DailyAggregate,
  MainsQuestion,
  MainsQuestionDraft,
  Mindmap,
  MindmapDraft,
  MindmapNode,
  OverallReview,
  PrelimsQuestion,
  PrelimsQuestionDraft,
  ReviewNotes,
  Section,
} from "./types.js";

// ---------------------------------------------------------------------------
// Reusable field schemas
// ---------------------------------------------------------------------------

export const DateKeySchema = z
  .string()
  .refine(isDateKey, "Must be a calendar date in DD-MM-YYYY format");

export const SectionImportanceSchema = z.enum([
  "absolutely_important",
  "important",
  "moderately_important",
]);

const nonEmptyText = z.string().trim().min(1);

/** Leading bullet glyphs models add despite being told not to */
const BULLET_PREFIX = /^\s*(?:[-*•▪]|\d+[.)])\s+/;

function splitBullets(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(BULLET_PREFIX, "").trim())
    .filter((line) => line.length > 0);
}

/** "GS2 (IR), GS3 (Energy)" -> ["GS2 (IR)", "GS3 (Energy)"] */
function splitCommaList(text: string): string[] {
  return text
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

/** A section as the model returns it; `index` is assigned by the extractor. */
export const ExtractedSectionSchema = z.object({
  title: nonEmptyText,
  content: z.union([
    z.array(z.string()).transform((items) =>
      items.flatMap((item) => splitBullets(item)),
    ),
    z.string().transform(splitBullets),
  ]),
  importance: SectionImportanceSchema.catch("moderately_important"),
});

const SectionSchema: z.ZodType<Section, z.ZodTypeDef, unknown> = z.object({
  index: z.number().int().min(0),
  title: z.string(),
  content: z.array(z.string()),
  importance: SectionImportanceSchema,
});

// ---------------------------------------------------------------------------
// Cards
// ---------------------------------------------------------------------------

export const CardDraftSchema: z.ZodType<CardDraft, z.ZodTypeDef, unknown> =
  z.object({
    title: nonEmptyText,
    gs_tags: z.array(z.string()),
    tags: z.array(z.string()),
    summary: nonEmptyText,
  });

/** Accepts the older `gs: "GS2, GS3"` field and missing tag lists. */
export const CardDraftLenientSchema: z.ZodType<
  CardDraft,
  z.ZodTypeDef,
  unknown
> = z
  .object({
    title: nonEmptyText,
    gs_tags: z.union([z.array(z.string()), z.string()]).optional(),
    gs: z.union([z.array(z.string()), z.string()]).optional(),
    tags: z.union([z.array(z.string()), z.string()]).optional(),
    summary: nonEmptyText,
  })
  .transform((raw) => {
    const gs = raw.gs_tags ?? raw.gs ?? [];
    const tags = raw.tags ?? [];
    return {
      title: raw.title,
      gs_tags: typeof gs === "string" ? splitCommaList(gs) : gs,
      tags: typeof tags === "string" ? splitCommaList(tags) : tags,
      summary: raw.summary,
    };
  });

// ---------------------------------------------------------------------------
// Mindmaps
// ---------------------------------------------------------------------------

export const MindmapNodeSchema: z.ZodType<MindmapNode, z.ZodTypeDef, unknown> =
  z.lazy(() =>
    z.object({
      name: nonEmptyText,
      children: z.array(MindmapNodeSchema).optional(),
    }),
  );

export const MindmapDraftSchema: z.ZodType<
  MindmapDraft,
  z.ZodTypeDef,
  unknown
> = z.object({
  title: nonEmptyText,
  nodes: z.array(MindmapNodeSchema),
});

// ---------------------------------------------------------------------------
// Questions
// ---------------------------------------------------------------------------

const yearField = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .optional();

export const PrelimsQuestionDraftSchema: z.ZodType<
  PrelimsQuestionDraft,
  z.ZodTypeDef,
  unknown
> = z
  .object({
    question: nonEmptyText,
    options: z.record(z.string()),
    correct_answer: nonEmptyText,
    explanation: z.string().optional(),
    gs_paper: z.string().optional(),
    year: yearField,
  })
  .refine((q) => Object.keys(q.options).length >= 2, {
    message: "A prelims question needs at least two options",
    path: ["options"],
  })
  .refine((q) => Object.hasOwn(q.options, q.correct_answer), {
    message: "correct_answer must name one of the option labels",
    path: ["correct_answer"],
  });

export const MainsQuestionDraftSchema: z.ZodType<
  MainsQuestionDraft,
  z.ZodTypeDef,
  unknown
> = z
  .object({
    question: nonEmptyText,
    marks: z.string().optional(),
    // Older prompt wording asked for "type": "10 marks"
    type: z.string().optional(),
    gs_paper: z.string().optional(),
    year: yearField,
    key_points: z.array(z.string()).optional(),
  })
  .transform(({ type, marks, ...rest }) => {
    const resolved = marks ?? type;
    return resolved === undefined ? rest : { ...rest, marks: resolved };
  });

/** Top-level question payload; items are validated one by one afterwards. */
export const QuestionPayloadSchema = z.object({
  prelims: z.array(z.unknown()).default([]),
  mains: z.array(z.unknown()).default([]),
});

// ---------------------------------------------------------------------------
// Review
// ---------------------------------------------------------------------------

export const ReviewNotesSchema: z.ZodType<ReviewNotes, z.ZodTypeDef, unknown> =
  z.object({
    issues_found: z.array(z.string()).default([]),
    corrections_made: z.array(z.string()).default([]),
    accuracy_score: z.number().min(0).max(1),
  });

export const ReviewPayloadSchema = z.object({
  cards: z.array(CardDraftLenientSchema),
  mindmap: MindmapDraftSchema.nullable(),
  prelims: z.array(PrelimsQuestionDraftSchema),
  mains: z.array(MainsQuestionDraftSchema),
  review_notes: ReviewNotesSchema,
});
export type ReviewPayload = z.infer<typeof ReviewPayloadSchema>;

// ---------------------------------------------------------------------------
// Stored aggregate (validated when read back from the store)
// ---------------------------------------------------------------------------

const provenanceShape = {
  section_index: z.number().int().min(0),
  section_title: z.string(),
};

const StoredCardSchema: z.ZodType<Card, z.ZodTypeDef, unknown> = z.object({
  title: z.string(),
  gs_tags: z.array(z.string()),
  tags: z.array(z.string()),
  summary: z.string(),
  ...provenanceShape,
});

const StoredMindmapSchema: z.ZodType<Mindmap, z.ZodTypeDef, unknown> =
  z.object({
    title: z.string(),
    nodes: z.array(MindmapNodeSchema),
    placeholder: z.literal(true).optional(),
    ...provenanceShape,
  });

const StoredPrelimsSchema: z.ZodType<PrelimsQuestion, z.ZodTypeDef, unknown> =
  z.object({
    question: z.string(),
    options: z.record(z.string()),
    correct_answer: z.string(),
    explanation: z.string().optional(),
    gs_paper: z.string().optional(),
    year: z.string().optional(),
    ...provenanceShape,
  });

const StoredMainsSchema: z.ZodType<MainsQuestion, z.ZodTypeDef, unknown> =
  z.object({
    question: z.string(),
    marks: z.string().optional(),
    gs_paper: z.string().optional(),
    year: z.string().optional(),
    key_points: z.array(z.string()).optional(),
    ...provenanceShape,
  });

const OverallReviewSchema: z.ZodType<OverallReview, z.ZodTypeDef, unknown> =
  z.object({
    total_issues: z.number(),
    total_corrections: z.number(),
    average_accuracy: z.number(),
  });

export const DailyAggregateSchema: z.ZodType<
  DailyAggregate,
  z.ZodTypeDef,
  unknown
> = z.object({
  date: DateKeySchema,
  sections: z.array(SectionSchema),
  cards: z.array(StoredCardSchema),
  mindmap: z.object({ mindmaps: z.array(StoredMindmapSchema) }),
  pyq: z.object({
    prelims: z.array(StoredPrelimsSchema),
    mains: z.array(StoredMainsSchema),
  }),
  overall_review: OverallReviewSchema.optional(),
  created_at: z.string(),
  updated_at: z.string(),
});

// ---------------------------------------------------------------------------
// API inputs
// ---------------------------------------------------------------------------

export const DateParamsInput = z.object({
  date: DateKeySchema.describe("Date in DD-MM-YYYY format, e.g. 13-10-2025"),
});
export type DateParamsInput = z.infer<typeof DateParamsInput>;

export const DateRangeInput = z.object({
  from: DateKeySchema.describe("First date of the range (DD-MM-YYYY)"),
  to: DateKeySchema.describe("Last date of the range (DD-MM-YYYY)"),
});
export type DateRangeInput = z.infer<typeof DateRangeInput>;
