// =============================================================================
// @dailysync/worker — In-process registry of background generation runs
// =============================================================================

import {
  assertDateKey,
  errorMessage,
  type DateKey,
  type Logger,
} from "@dailysync/shared";
import type { ContentPipeline } from "./orchestrator.js";

export interface StartResult {
  status: "started" | "already_running";
  date: DateKey;
}

export interface GenerationJobs {
  /**
   * Starts a background run for `date` and returns immediately. Throws
   * InputError for a malformed date. A date already running in this process
   * is not started twice.
   */
  startGeneration(date: string): StartResult;
  activeDates(): DateKey[];
  /** Resolves once every in-flight run has settled. */
  idle(): Promise<void>;
}

export function createGenerationJobs(
  pipeline: ContentPipeline,
  logger: Logger,
): GenerationJobs {
  const inFlight = new Map<DateKey, Promise<void>>();

  return {
    startGeneration(input) {
      const date = assertDateKey(input);
      if (inFlight.has(date)) {
        logger.info("Generation already running", { date });
        return { status: "already_running", date };
      }

      const run = pipeline
        .run(date)
        .then((result) => {
          if (!result.ok) {
            logger.warn("Background generation gave up", {
              date,
              attempts: result.attempts,
              reason: result.reason,
            });
          }
        })
        .catch((err: unknown) => {
          logger.error("Background generation crashed", {
            date,
            error: errorMessage(err),
          });
        })
        .finally(() => {
          inFlight.delete(date);
        });

      inFlight.set(date, run);
      logger.info("Generation started", { date });
      return { status: "started", date };
    },

    activeDates() {
      return [...inFlight.keys()];
    },

    async idle() {
      while (inFlight.size > 0) {
        await Promise.all(inFlight.values());
      }
    },
  };
}
