export { createDriver, healthCheck, closeDriver, toNumber } from "./driver.js";

export type { Driver, Session, HealthCheckResult } from "./driver.js";

export {
  ensureContentSchema,
  CONTENT_SCHEMA_STATEMENTS,
} from "./schema.js";
export type { SchemaLogger } from "./schema.js";

export {
  createNeo4jContentStore,
  toDailyAggregate,
} from "./daily-content.js";
export type { Neo4jContentStoreOptions } from "./daily-content.js";
