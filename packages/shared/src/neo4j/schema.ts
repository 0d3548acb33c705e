// =============================================================================
// @dailysync/shared — Idempotent Neo4j schema setup
// =============================================================================
// One :DailyContent node per date. The uniqueness constraint makes MERGE on
// `date` safe under concurrent writers; the `day` index serves ordered and
// range reads.
// =============================================================================

import type { Driver } from "./driver.js";

export interface SchemaLogger {
  info: (msg: string) => void;
}

export const CONTENT_SCHEMA_STATEMENTS = [
  `CREATE CONSTRAINT daily_content_date IF NOT EXISTS
   FOR (d:DailyContent) REQUIRE d.date IS UNIQUE`,
  `CREATE INDEX daily_content_day IF NOT EXISTS
   FOR (d:DailyContent) ON (d.day)`,
] as const;

/**
 * Creates the DailyContent constraint and index. Safe to run on every boot.
 *
 * @returns number of statements executed
 */
export async function ensureContentSchema(
  driver: Driver,
  logger: SchemaLogger = console,
): Promise<number> {
  const session = driver.session();
  try {
    for (const statement of CONTENT_SCHEMA_STATEMENTS) {
      await session.run(statement);
    }
    logger.info(
      `Content schema ensured (${CONTENT_SCHEMA_STATEMENTS.length} statements)`,
    );
    return CONTENT_SCHEMA_STATEMENTS.length;
  } finally {
    await session.close();
  }
}
