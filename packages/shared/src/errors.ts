// =============================================================================
// @dailysync/shared — Error types
// =============================================================================
// Each failure class of the pipeline has its own error so callers can tell a
// rejected date from a malformed model response or a failed store write.
// =============================================================================

import type { GenerationTask } from "./types.js";

/** Malformed caller input (e.g. a date that is not DD-MM-YYYY). Never retried. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

/** One source could not be fetched. The aggregator logs it and moves on. */
export class SourceFetchError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`Source "${source}": ${message}`, options);
    this.name = "SourceFetchError";
    this.source = source;
  }
}

/** A cached source file is truncated, unsigned or does not match its checksum. */
export class CacheIntegrityError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${message} (${path})`);
    this.name = "CacheIntegrityError";
    this.path = path;
  }
}

/** No JSON payload could be located in a model response. */
export class PayloadParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PayloadParseError";
  }
}

/** Section extraction failed: call error, empty response or bad payload. */
export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

/** An artifact generator could not produce a usable payload. */
export class GenerationError extends Error {
  readonly task: GenerationTask;

  constructor(
    task: GenerationTask,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${task}: ${message}`, options);
    this.name = "GenerationError";
    this.task = task;
  }
}

/** The content store rejected a read or write. */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}
