// =============================================================================
// Test doubles shared by the worker test suites
// =============================================================================

import {
  createLogger,
  createMemoryContentStore,
  createPromptLibrary,
  PersistenceError,
  type ContentStore,
  type DailyContentDraft,
  type GenerationClient,
  type GenerationRequest,
  type GenerationTask,
  type Logger,
  type PromptLibrary,
} from "@dailysync/shared";

// ---------------------------------------------------------------------------
// Logger that keeps its entries
// ---------------------------------------------------------------------------

export interface CapturedLogger {
  logger: Logger;
  entries: Array<Record<string, unknown>>;
}

export function captureLogger(): CapturedLogger {
  const entries: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level: "trace",
    destination: {
      write(line) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === "object" && parsed !== null) {
          entries.push({ ...parsed });
        }
      },
    },
  });
  return { logger, entries };
}

// ---------------------------------------------------------------------------
// Scripted generation client
// ---------------------------------------------------------------------------

export type ScriptHandler = (request: GenerationRequest) => string | Promise<string>;

export interface ScriptedClient extends GenerationClient {
  calls: GenerationRequest[];
  callsFor(task: GenerationTask): GenerationRequest[];
}

/** Answers each task with its handler; a task without one throws. */
export function createScriptedClient(
  handlers: Partial<Record<GenerationTask, ScriptHandler>>,
): ScriptedClient {
  const calls: GenerationRequest[] = [];
  return {
    provider: "scripted",
    model: "scripted-model",
    calls,
    callsFor(task) {
      return calls.filter((c) => c.task === task);
    },
    async generate(request) {
      calls.push(request);
      const handler = handlers[request.task];
      if (!handler) {
        throw new Error(`No scripted response for task "${request.task}"`);
      }
      return handler(request);
    },
  };
}

export function fenced(value: unknown): string {
  return "Here is the result:\n```json\n" + JSON.stringify(value) + "\n```";
}

export function testPrompts(): PromptLibrary {
  return createPromptLibrary();
}

// ---------------------------------------------------------------------------
// In-memory content store
// ---------------------------------------------------------------------------

export interface MemoryStore extends ContentStore {
  upserts: DailyContentDraft[];
  /** Number of upcoming upserts that throw PersistenceError */
  failNextWrites: number;
}

export function createMemoryStore(now?: () => number): MemoryStore {
  const inner = createMemoryContentStore({ now });

  const store: MemoryStore = {
    upserts: [],
    failNextWrites: 0,

    async upsert(draft) {
      if (store.failNextWrites > 0) {
        store.failNextWrites -= 1;
        throw new PersistenceError("Write rejected by test store");
      }
      store.upserts.push(draft);
      return inner.upsert(draft);
    },
    get: (date) => inner.get(date),
    listDates: () => inner.listDates(),
    listRange: (from, to) => inner.listRange(from, to),
    delete: (date) => inner.delete(date),
  };
  return store;
}
