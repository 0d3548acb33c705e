// =============================================================================
// @dailysync/server — Content REST API routes
// =============================================================================
// Mounted under /api. Generation runs in the background: POST returns 202
// as soon as the run is registered.
// =============================================================================

import { Router, type Request, type Response } from "express";
import {
  DateParamsInput,
  DateRangeInput,
  InputError,
  errorMessage,
} from "@dailysync/shared";
import type { z } from "zod";
import type { AppDependencies } from "./server.js";

/** First validation message, e.g. "date: Must be a calendar date in DD-MM-YYYY format" */
function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid input";
  return issue.path.length > 0
    ? `${issue.path.join(".")}: ${issue.message}`
    : issue.message;
}

/**
 * Runs a route body; InputError becomes 400 and anything else 500, both as
 * `{ error }` JSON.
 */
async function respond(
  deps: AppDependencies,
  res: Response,
  fn: () => Promise<void>,
): Promise<void> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof InputError) {
      res.status(400).json({ error: err.message });
      return;
    }
    deps.logger.error("Request failed", { error: errorMessage(err) });
    res.status(500).json({ error: errorMessage(err) });
  }
}

export function createContentRouter(deps: AppDependencies): Router {
  const router = Router();
  const { store, jobs } = deps;

  // -------------------------------------------------------------------------
  // POST /api/generate/:date — start a background generation run
  // -------------------------------------------------------------------------
  router.post("/generate/:date", async (req: Request, res: Response) => {
    await respond(deps, res, async () => {
      const params = DateParamsInput.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: describeIssues(params.error) });
        return;
      }
      res.status(202).json(jobs.startGeneration(params.data.date));
    });
  });

  // -------------------------------------------------------------------------
  // GET /api/content/:date — one stored aggregate
  // -------------------------------------------------------------------------
  router.get("/content/:date", async (req: Request, res: Response) => {
    await respond(deps, res, async () => {
      const params = DateParamsInput.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: describeIssues(params.error) });
        return;
      }
      const content = await store.get(params.data.date);
      if (!content) {
        res.status(404).json({ error: `No content found for ${params.data.date}` });
        return;
      }
      res.json(content);
    });
  });

  // -------------------------------------------------------------------------
  // GET /api/content?from=&to= — aggregates in an inclusive date range
  // -------------------------------------------------------------------------
  router.get("/content", async (req: Request, res: Response) => {
    await respond(deps, res, async () => {
      const range = DateRangeInput.safeParse(req.query);
      if (!range.success) {
        res.status(400).json({ error: describeIssues(range.error) });
        return;
      }
      const items = await store.listRange(range.data.from, range.data.to);
      res.json({ items });
    });
  });

  // -------------------------------------------------------------------------
  // DELETE /api/content/:date
  // -------------------------------------------------------------------------
  router.delete("/content/:date", async (req: Request, res: Response) => {
    await respond(deps, res, async () => {
      const params = DateParamsInput.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: describeIssues(params.error) });
        return;
      }
      const deleted = await store.delete(params.data.date);
      if (!deleted) {
        res.status(404).json({ error: `No content found for ${params.data.date}` });
        return;
      }
      res.json({ deleted: true });
    });
  });

  // -------------------------------------------------------------------------
  // GET /api/dates — stored dates, newest first
  // -------------------------------------------------------------------------
  router.get("/dates", async (_req: Request, res: Response) => {
    await respond(deps, res, async () => {
      res.json({ dates: await store.listDates() });
    });
  });

  return router;
}
