// =============================================================================
// @dailysync/worker — Barrel export
// =============================================================================

export {
  createFileSourceCache,
  cacheFileName,
  integrityHeader,
  type SourceCache,
} from "./sources/cache.js";
export { extractArticleText } from "./sources/html.js";
export {
  createSourceAggregator,
  sourceUrl,
  type FetchFn,
  type SourceAggregator,
  type SourceAggregatorOptions,
} from "./sources/aggregator.js";

export {
  extractSections,
  type ExtractionOutcome,
} from "./extraction/sections.js";

export * from "./generators/index.js";

export {
  combineReviews,
  reviewSectionDrafts,
  UNPARSEABLE_REVIEW_NOTE,
  type ReviewResult,
  type SectionDrafts,
} from "./review/review.js";

export {
  findProvenanceViolations,
  provenanceOf,
  tagCards,
  tagMindmap,
  tagQuestions,
} from "./pipeline/provenance.js";
export {
  createContentPipeline,
  summarize,
  SUCCESS_MESSAGE,
  type ContentPipeline,
  type PipelineDependencies,
  type PipelineOptions,
  type PipelineResult,
  type StateChange,
} from "./pipeline/orchestrator.js";
export {
  createGenerationJobs,
  type GenerationJobs,
  type StartResult,
} from "./pipeline/jobs.js";
