// =============================================================================
// @dailysync/worker — Content pipeline orchestrator
// =============================================================================
// Drives one date through the pipeline:
//
//   PENDING → SCRAPING → EXTRACTING → GENERATING → SAVING → DONE
//
// with FAILED reachable from any non-terminal state. Each attempt ends in a
// tagged outcome; "empty" and "failure" both consume an attempt. Nothing is
// written to the store unless an attempt reaches SAVING.
// =============================================================================

import {
  assertDateKey,
  errorMessage,
  isDateKey,
  type Card,
  type ContentStore,
  type DailyContentDraft,
  type DateKey,
  type GenerationClient,
  type GenerationSummary,
  type Logger,
  type MainsQuestion,
  type Mindmap,
  type PipelineState,
  type PrelimsQuestion,
  type PromptLibrary,
  type ReviewNotes,
  type Section,
} from "@dailysync/shared";
import { extractSections } from "../extraction/sections.js";
import { generateCards } from "../generators/cards.js";
import { generateMindmap } from "../generators/mindmap.js";
import type { GeneratorDeps } from "../generators/payload.js";
import { generateQuestions } from "../generators/questions.js";
import {
  combineReviews,
  reviewSectionDrafts,
  type SectionDrafts,
} from "../review/review.js";
import type { SourceAggregator } from "../sources/aggregator.js";
import {
  findProvenanceViolations,
  tagCards,
  tagMindmap,
  tagQuestions,
} from "./provenance.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PipelineDependencies {
  sources: SourceAggregator;
  generation: GenerationClient;
  prompts: PromptLibrary;
  store: ContentStore;
  logger: Logger;
}

export interface StateChange {
  date: DateKey;
  state: PipelineState;
  /** 0 before the first attempt starts */
  attempt: number;
}

export interface PipelineOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
  reviewEnabled?: boolean;
  sleep?: (ms: number) => Promise<void>;
  onStateChange?: (change: StateChange) => void;
}

export type PipelineResult =
  | { ok: true; summary: GenerationSummary; attempts: number }
  | { ok: false; date: DateKey; attempts: number; reason: string };

type AttemptOutcome =
  | { kind: "success"; summary: GenerationSummary }
  | { kind: "empty"; reason: string }
  | { kind: "failure"; error: unknown };

export interface ContentPipeline {
  /** Throws InputError for a malformed date; every other failure is a result. */
  run(date: string): Promise<PipelineResult>;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 5_000;

export const SUCCESS_MESSAGE = "Content generated and saved successfully";

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export function summarize(draft: DailyContentDraft): GenerationSummary {
  const summary: GenerationSummary = {
    message: SUCCESS_MESSAGE,
    date: draft.date,
    sections_count: draft.sections.length,
    cards_count: draft.cards.length,
    mindmaps_count: draft.mindmap.mindmaps.length,
    prelims_count: draft.pyq.prelims.length,
    mains_count: draft.pyq.mains.length,
  };
  if (draft.overall_review) {
    summary.review_summary = draft.overall_review;
  }
  return summary;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createContentPipeline(
  deps: PipelineDependencies,
  options: PipelineOptions = {},
): ContentPipeline {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const reviewEnabled = options.reviewEnabled ?? false;
  const sleep = options.sleep ?? defaultSleep;

  async function buildAggregate(
    date: DateKey,
    sections: Section[],
    generators: GeneratorDeps,
  ): Promise<DailyContentDraft> {
    const cards: Card[] = [];
    const mindmaps: Mindmap[] = [];
    const prelims: PrelimsQuestion[] = [];
    const mains: MainsQuestion[] = [];
    const reviews: ReviewNotes[] = [];

    for (const section of sections) {
      const text = section.content.join("\n");
      const [cardDrafts, mindmapDraft, questionDrafts] = await Promise.all([
        generateCards(generators, text),
        generateMindmap(generators, text),
        generateQuestions(generators, text),
      ]);

      let drafts: SectionDrafts = {
        cards: cardDrafts,
        mindmap: mindmapDraft,
        questions: questionDrafts,
      };
      if (reviewEnabled) {
        const review = await reviewSectionDrafts(generators, section, drafts);
        drafts = review.drafts;
        reviews.push(review.notes);
      }

      cards.push(...tagCards(section, drafts.cards));
      mindmaps.push(tagMindmap(section, drafts.mindmap));
      const questions = tagQuestions(section, drafts.questions);
      prelims.push(...questions.prelims);
      mains.push(...questions.mains);

      generators.logger.debug("Section generated", {
        section: section.index,
        cards: drafts.cards.length,
        prelims: questions.prelims.length,
        mains: questions.mains.length,
      });
    }

    const draft: DailyContentDraft = {
      date,
      sections,
      cards,
      mindmap: { mindmaps },
      pyq: { prelims, mains },
    };
    if (reviewEnabled) {
      draft.overall_review = combineReviews(reviews);
    }
    return draft;
  }

  return {
    async run(input) {
      const emit = (state: PipelineState, attempt: number): void => {
        options.onStateChange?.({ date: input, state, attempt });
      };

      emit("PENDING", 0);
      if (!isDateKey(input)) {
        emit("FAILED", 0);
      }
      const date = assertDateKey(input);

      const log = deps.logger.child({ date });
      const generators: GeneratorDeps = {
        client: deps.generation,
        prompts: deps.prompts,
        logger: log,
      };

      async function attemptOnce(attempt: number): Promise<AttemptOutcome> {
        try {
          emit("SCRAPING", attempt);
          const rawText = await deps.sources.fetchSourceText(date);
          if (rawText.trim().length === 0) {
            return { kind: "empty", reason: "No source text could be fetched" };
          }

          emit("EXTRACTING", attempt);
          const extraction = await extractSections(
            deps.generation,
            deps.prompts,
            rawText,
          );
          if (extraction.kind === "empty") {
            return { kind: "empty", reason: "Extraction returned no sections" };
          }

          emit("GENERATING", attempt);
          const draft = await buildAggregate(date, extraction.sections, generators);
          const violations = findProvenanceViolations(draft);
          if (violations.length > 0) {
            throw new Error(`Provenance check failed: ${violations.join("; ")}`);
          }

          emit("SAVING", attempt);
          await deps.store.upsert(draft);
          return { kind: "success", summary: summarize(draft) };
        } catch (error) {
          return { kind: "failure", error };
        }
      }

      let reason = "No attempts were made";
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        log.info("Attempt started", { attempt, maxAttempts });
        const outcome = await attemptOnce(attempt);

        if (outcome.kind === "success") {
          emit("DONE", attempt);
          log.info("Content generated", { attempt, ...outcome.summary });
          return { ok: true, summary: outcome.summary, attempts: attempt };
        }

        if (outcome.kind === "empty") {
          reason = outcome.reason;
          log.warn("Attempt produced no content", { attempt, maxAttempts, reason });
        } else {
          reason = errorMessage(outcome.error);
          log.error("Attempt failed", {
            attempt,
            maxAttempts,
            error: reason,
            errorName: outcome.error instanceof Error ? outcome.error.name : undefined,
          });
        }

        if (attempt < maxAttempts) {
          await sleep(retryDelayMs);
        }
      }

      emit("FAILED", maxAttempts);
      log.error("Content generation failed after retries", {
        attempts: maxAttempts,
        reason,
      });
      return { ok: false, date, attempts: maxAttempts, reason };
    },
  };
}
