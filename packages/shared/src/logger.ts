// =============================================================================
// @dailysync/shared — Structured JSON logger
// =============================================================================
// One JSON object per line. Child loggers merge their bindings into every
// entry, so a pipeline run can bind { date } once and every stage inherits it.
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Where serialized entries go. Defaults to process.stdout. */
export interface LogDestination {
  write(line: string): void;
}

export interface LoggerOptions {
  level?: string;
  destination?: LogDestination;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_VALUES;
}

export function createLogger(options?: LoggerOptions): Logger {
  const levelName = options?.level ?? "info";
  const threshold = isLogLevel(levelName)
    ? LEVEL_VALUES[levelName]
    : LEVEL_VALUES.info;

  return buildLogger(threshold, {}, options?.destination ?? process.stdout);
}

function buildLogger(
  threshold: number,
  bindings: Record<string, unknown>,
  destination: LogDestination,
): Logger {
  function write(
    level: LogLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_VALUES[level] < threshold) return;

    const entry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      ...bindings,
      ...data,
    };

    destination.write(JSON.stringify(entry) + "\n");
  }

  return {
    trace: (msg, data) => write("trace", msg, data),
    debug: (msg, data) => write("debug", msg, data),
    info: (msg, data) => write("info", msg, data),
    warn: (msg, data) => write("warn", msg, data),
    error: (msg, data) => write("error", msg, data),
    fatal: (msg, data) => write("fatal", msg, data),
    child: (childBindings) =>
      buildLogger(threshold, { ...bindings, ...childBindings }, destination),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function logToolCall(
  logger: Logger,
  toolName: string,
  input: Record<string, unknown>,
  durationMs: number,
  error?: string,
): void {
  const data: Record<string, unknown> = { tool: toolName, input, durationMs };
  if (error !== undefined) {
    data.error = error;
    logger.error("Tool call failed", data);
  } else {
    logger.info("Tool called", data);
  }
}

export type ExternalService = "neo4j" | "gemini" | "anthropic" | "source";

export function logExternalCall(
  logger: Logger,
  service: ExternalService,
  operation: string,
  durationMs: number,
  error?: string,
): void {
  const data: Record<string, unknown> = { service, operation, durationMs };
  if (error !== undefined) {
    data.error = error;
    logger.error("External call failed", data);
  } else {
    logger.debug("External call completed", data);
  }
}
