// =============================================================================
// In-process dependencies for server tests
// =============================================================================

import {
  assertDateKey,
  createLogger,
  createMemoryContentStore,
  loadConfig,
  type DailyContentDraft,
  type HealthCheckResult,
} from "@dailysync/shared";
import type { GenerationJobs } from "@dailysync/worker";
import type { AppDependencies } from "../server.js";

export const TEST_ENV = {
  NEO4J_URI: "bolt://localhost:7687",
  NEO4J_USER: "neo4j",
  NEO4J_PASSWORD: "test-secret",
  GEMINI_API_KEY: "test-key",
  LOG_LEVEL: "fatal",
};

export interface TestDependencies extends AppDependencies {
  started: string[];
  closed: () => boolean;
  setHealth: (result: HealthCheckResult) => void;
}

/** Jobs that record the dates they were asked to start. */
function recordingJobs(started: string[]): GenerationJobs {
  const active = new Set<string>();
  return {
    startGeneration(input) {
      const date = assertDateKey(input);
      if (active.has(date)) return { status: "already_running", date };
      active.add(date);
      started.push(date);
      return { status: "started", date };
    },
    activeDates: () => [...active],
    idle: async () => {
      active.clear();
    },
  };
}

export function createTestDependencies(): TestDependencies {
  const started: string[] = [];
  let closed = false;
  let health: HealthCheckResult = { ok: true, latencyMs: 1 };

  return {
    config: loadConfig(TEST_ENV),
    logger: createLogger({ level: "fatal", destination: { write: () => {} } }),
    store: createMemoryContentStore({ now: () => Date.UTC(2025, 9, 13, 6, 0, 0) }),
    jobs: recordingJobs(started),
    checkHealth: async () => health,
    close: async () => {
      closed = true;
    },
    started,
    closed: () => closed,
    setHealth: (result) => {
      health = result;
    },
  };
}

export function sampleDraft(date: string): DailyContentDraft {
  return {
    date,
    sections: [
      { index: 0, title: "Monsoon Outlook", content: ["Above normal rainfall"], importance: "important" },
    ],
    cards: [
      {
        title: "Monsoon",
        gs_tags: ["GS1"],
        tags: ["weather"],
        summary: "Rain above normal.",
        section_index: 0,
        section_title: "Monsoon Outlook",
      },
    ],
    mindmap: {
      mindmaps: [
        { title: "Monsoon", nodes: [{ name: "Rainfall" }], section_index: 0, section_title: "Monsoon Outlook" },
      ],
    },
    pyq: {
      prelims: [],
      mains: [{ question: "Discuss the monsoon.", section_index: 0, section_title: "Monsoon Outlook" }],
    },
  };
}
