#!/usr/bin/env node
// =============================================================================
// @dailysync/shared — CLI schema script
// =============================================================================
// Creates the DailyContent constraint and index on a Neo4j database.
//
// Usage:
//   NEO4J_URI=neo4j+s://... NEO4J_USER=neo4j NEO4J_PASSWORD=... npm run schema
// =============================================================================

import neo4j from "neo4j-driver";
import { ensureContentSchema } from "./neo4j/schema.js";

const uri = process.env.NEO4J_URI;
const user = process.env.NEO4J_USER ?? "neo4j";
const password = process.env.NEO4J_PASSWORD;

if (!uri || !password) {
  console.error(
    "Missing required env vars: NEO4J_URI and NEO4J_PASSWORD must be set.",
  );
  process.exit(1);
}

console.log(`Connecting to ${uri} as ${user}...`);

const driver = neo4j.driver(uri, neo4j.auth.basic(user, password));

try {
  await driver.verifyConnectivity();
  console.log("Connected to Neo4j.\n");

  const statements = await ensureContentSchema(driver, console);
  console.log(`\nSchema statements applied: ${statements}`);
} catch (err) {
  console.error(
    "Schema setup failed:",
    err instanceof Error ? err.message : String(err),
  );
  process.exitCode = 1;
} finally {
  await driver.close();
}
