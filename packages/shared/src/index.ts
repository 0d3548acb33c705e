// @dailysync/shared — types, config, logging, generation clients and the content store
export * from "./types.js";
export * from "./errors.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./date-key.js";
export * from "./json-payload.js";
export * from "./content-store.js";
export * from "./memory-content-store.js";
export * from "./generation/index.js";
export * from "./prompts/index.js";
export * from "./neo4j/index.js";
