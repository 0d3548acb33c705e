// =============================================================================
// @dailysync/shared — Types for the daily study-content aggregate
// =============================================================================
// Field names of persisted records stay snake_case: they are the document
// shape served by the query API.
// =============================================================================

// ---------------------------------------------------------------------------
// Enums & Union Types
// ---------------------------------------------------------------------------

/** Canonical date key, DD-MM-YYYY (e.g. "13-10-2025"). */
export type DateKey = string;

/** How much a section matters for exam preparation */
export type SectionImportance =
  | "absolutely_important"
  | "important"
  | "moderately_important";

/** Which prompt a generation call belongs to */
export type GenerationTask =
  | "sections"
  | "cards"
  | "mindmap"
  | "questions"
  | "review";

/** Pipeline lifecycle for one date */
export type PipelineState =
  | "PENDING"
  | "SCRAPING"
  | "EXTRACTING"
  | "GENERATING"
  | "SAVING"
  | "DONE"
  | "FAILED";

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export interface Section {
  /** 0-based position in extraction order; the only provenance key */
  index: number;
  title: string;
  /** One bullet point per entry */
  content: string[];
  importance: SectionImportance;
}

// ---------------------------------------------------------------------------
// Provenance
// ---------------------------------------------------------------------------

export interface Provenance {
  section_index: number;
  section_title: string;
}

// ---------------------------------------------------------------------------
// Artifact drafts (generator output, no provenance)
// ---------------------------------------------------------------------------

export interface CardDraft {
  title: string;
  gs_tags: string[];
  tags: string[];
  summary: string;
}

export interface MindmapNode {
  name: string;
  children?: MindmapNode[];
}

export interface MindmapDraft {
  title: string;
  nodes: MindmapNode[];
}

export interface PrelimsQuestionDraft {
  question: string;
  /** Option label (a, b, c, d) to option text */
  options: Record<string, string>;
  correct_answer: string;
  explanation?: string;
  gs_paper?: string;
  year?: string;
}

export interface MainsQuestionDraft {
  question: string;
  marks?: string;
  gs_paper?: string;
  year?: string;
  key_points?: string[];
}

export interface QuestionSetDraft {
  prelims: PrelimsQuestionDraft[];
  mains: MainsQuestionDraft[];
}

// ---------------------------------------------------------------------------
// Artifacts (with provenance)
// ---------------------------------------------------------------------------

export type Card = CardDraft & Provenance;

export type Mindmap = MindmapDraft &
  Provenance & {
    /** Set when the generator produced nothing usable for the section */
    placeholder?: true;
  };

export type PrelimsQuestion = PrelimsQuestionDraft & Provenance;

export type MainsQuestion = MainsQuestionDraft & Provenance;

// ---------------------------------------------------------------------------
// Review
// ---------------------------------------------------------------------------

export interface ReviewNotes {
  issues_found: string[];
  corrections_made: string[];
  accuracy_score: number;
}

export interface OverallReview {
  total_issues: number;
  total_corrections: number;
  average_accuracy: number;
}

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------

/** Everything the pipeline writes for one date, before timestamps. */
export interface DailyContentDraft {
  date: DateKey;
  sections: Section[];
  cards: Card[];
  mindmap: { mindmaps: Mindmap[] };
  pyq: { prelims: PrelimsQuestion[]; mains: MainsQuestion[] };
  overall_review?: OverallReview;
}

export interface StoredTimestamps {
  /** ISO-8601 */
  created_at: string;
  /** ISO-8601, strictly increasing across overwrites */
  updated_at: string;
}

export type DailyAggregate = DailyContentDraft & StoredTimestamps;

// ---------------------------------------------------------------------------
// Pipeline results
// ---------------------------------------------------------------------------

export interface GenerationSummary {
  message: string;
  date: DateKey;
  sections_count: number;
  cards_count: number;
  mindmaps_count: number;
  prelims_count: number;
  mains_count: number;
  review_summary?: OverallReview;
}
