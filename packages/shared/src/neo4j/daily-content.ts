// =============================================================================
// @dailysync/shared — DailyContent Neo4j store
// =============================================================================
// One :DailyContent node per date. Collections are stored as JSON strings and
// validated with zod on the way out. Timestamps are epoch milliseconds:
// created_at_ms is set once, updated_at_ms moves forward on every write even
// when two writes land in the same millisecond.
// =============================================================================

import { ZodError } from "zod";
import { compareDateKeysDesc, dateKeyToDayNumber } from "../date-key.js";
import { InputError, PersistenceError } from "../errors.js";
import { errorMessage, logExternalCall, type Logger } from "../logger.js";
import { DailyAggregateSchema } from "../schemas.js";
import type { ContentStore } from "../content-store.js";
import type {
  DailyAggregate,
  DailyContentDraft,
  DateKey,
  StoredTimestamps,
} from "../types.js";
import { toNumber, type Driver, type Session } from "./driver.js";

// ---------------------------------------------------------------------------
// Cypher
// ---------------------------------------------------------------------------

const UPSERT_QUERY = `
MERGE (d:DailyContent {date: $date})
ON CREATE SET d.created_at_ms = $now
SET d.updated_at_ms = CASE
      WHEN d.updated_at_ms IS NULL OR d.updated_at_ms < $now THEN $now
      ELSE d.updated_at_ms + 1
    END,
    d.day = $day,
    d.sections = $sections,
    d.cards = $cards,
    d.mindmap = $mindmap,
    d.pyq = $pyq,
    d.overall_review = $overallReview
RETURN d.created_at_ms AS created_at_ms, d.updated_at_ms AS updated_at_ms`;

const CONTENT_FIELDS = `d.date AS date, d.sections AS sections, d.cards AS cards,
  d.mindmap AS mindmap, d.pyq AS pyq, d.overall_review AS overall_review,
  d.created_at_ms AS created_at_ms, d.updated_at_ms AS updated_at_ms`;

const GET_QUERY = `MATCH (d:DailyContent {date: $date}) RETURN ${CONTENT_FIELDS}`;

const LIST_DATES_QUERY = `MATCH (d:DailyContent) RETURN d.date AS date`;

const RANGE_QUERY = `
MATCH (d:DailyContent)
WHERE d.day >= $from AND d.day <= $to
RETURN ${CONTENT_FIELDS}
ORDER BY d.day DESC`;

const DELETE_QUERY = `
MATCH (d:DailyContent {date: $date})
DETACH DELETE d
RETURN $date AS date`;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface RecordLike {
  get(key: string): unknown;
}

function isoFromMillis(value: unknown): string {
  return new Date(toNumber(value)).toISOString();
}

function parseJsonField(value: unknown, field: string): unknown {
  if (typeof value !== "string") {
    throw new PersistenceError(`Stored field "${field}" is missing`);
  }
  try {
    return JSON.parse(value);
  } catch (err) {
    throw new PersistenceError(`Stored field "${field}" is not valid JSON`, {
      cause: err,
    });
  }
}

/** Maps a returned row to a validated DailyAggregate. */
export function toDailyAggregate(record: RecordLike): DailyAggregate {
  const overallReview = record.get("overall_review");
  const candidate = {
    date: record.get("date"),
    sections: parseJsonField(record.get("sections"), "sections"),
    cards: parseJsonField(record.get("cards"), "cards"),
    mindmap: parseJsonField(record.get("mindmap"), "mindmap"),
    pyq: parseJsonField(record.get("pyq"), "pyq"),
    overall_review:
      overallReview === null || overallReview === undefined
        ? undefined
        : parseJsonField(overallReview, "overall_review"),
    created_at: isoFromMillis(record.get("created_at_ms")),
    updated_at: isoFromMillis(record.get("updated_at_ms")),
  };

  try {
    return DailyAggregateSchema.parse(candidate);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new PersistenceError(
        `Stored content for ${String(candidate.date)} does not match the aggregate schema: ${err.message}`,
        { cause: err },
      );
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface Neo4jContentStoreOptions {
  logger?: Logger;
  /** Clock for created/updated timestamps */
  now?: () => number;
}

export function createNeo4jContentStore(
  driver: Driver,
  options: Neo4jContentStoreOptions = {},
): ContentStore {
  const now = options.now ?? Date.now;

  // Runs one store operation in its own session; driver errors become
  // PersistenceError so the pipeline can tell them apart.
  async function withSession<T>(
    operation: string,
    fn: (session: Session) => Promise<T>,
  ): Promise<T> {
    const start = performance.now();
    const session = driver.session();
    try {
      const result = await fn(session);
      if (options.logger) {
        logExternalCall(
          options.logger,
          "neo4j",
          operation,
          Math.round(performance.now() - start),
        );
      }
      return result;
    } catch (err) {
      if (options.logger) {
        logExternalCall(
          options.logger,
          "neo4j",
          operation,
          Math.round(performance.now() - start),
          errorMessage(err),
        );
      }
      if (err instanceof PersistenceError || err instanceof InputError) {
        throw err;
      }
      throw new PersistenceError(`${operation} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    } finally {
      await session.close();
    }
  }

  return {
    async upsert(draft: DailyContentDraft): Promise<StoredTimestamps> {
      const params = {
        date: draft.date,
        day: dateKeyToDayNumber(draft.date),
        now: now(),
        sections: JSON.stringify(draft.sections),
        cards: JSON.stringify(draft.cards),
        mindmap: JSON.stringify(draft.mindmap),
        pyq: JSON.stringify(draft.pyq),
        overallReview:
          draft.overall_review === undefined
            ? null
            : JSON.stringify(draft.overall_review),
      };

      return withSession("upsertDailyContent", async (session) => {
        const result = await session.executeWrite((tx) =>
          tx.run(UPSERT_QUERY, params),
        );
        const record = result.records[0];
        if (!record) {
          throw new PersistenceError(
            `Upsert for ${draft.date} returned no record`,
          );
        }
        return {
          created_at: isoFromMillis(record.get("created_at_ms")),
          updated_at: isoFromMillis(record.get("updated_at_ms")),
        };
      });
    },

    async get(date: DateKey): Promise<DailyAggregate | null> {
      return withSession("getDailyContent", async (session) => {
        const result = await session.executeRead((tx) =>
          tx.run(GET_QUERY, { date }),
        );
        const record = result.records[0];
        return record ? toDailyAggregate(record) : null;
      });
    },

    async listDates(): Promise<DateKey[]> {
      return withSession("listDailyContentDates", async (session) => {
        const result = await session.executeRead((tx) =>
          tx.run(LIST_DATES_QUERY),
        );
        const dates: DateKey[] = [];
        for (const record of result.records) {
          const value: unknown = record.get("date");
          if (typeof value === "string") dates.push(value);
        }
        return dates.sort(compareDateKeysDesc);
      });
    },

    async listRange(from: DateKey, to: DateKey): Promise<DailyAggregate[]> {
      const fromDay = dateKeyToDayNumber(from);
      const toDay = dateKeyToDayNumber(to);
      if (fromDay > toDay) {
        throw new InputError(`Range start ${from} is after range end ${to}`);
      }
      return withSession("listDailyContentRange", async (session) => {
        const result = await session.executeRead((tx) =>
          tx.run(RANGE_QUERY, { from: fromDay, to: toDay }),
        );
        return result.records.map((record) => toDailyAggregate(record));
      });
    },

    async delete(date: DateKey): Promise<boolean> {
      return withSession("deleteDailyContent", async (session) => {
        const result = await session.executeWrite((tx) =>
          tx.run(DELETE_QUERY, { date }),
        );
        return result.records.length > 0;
      });
    },
  };
}
