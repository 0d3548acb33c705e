// =============================================================================
// Unit tests for the DailyContent Neo4j store
// =============================================================================
// Uses a mock driver/session to verify Cypher parameters and row mapping
// without needing a live database connection.
// =============================================================================

import { describe, it, expect, vi } from "vitest";
import neo4j from "neo4j-driver";
import { createNeo4jContentStore, toDailyAggregate } from "../daily-content.js";
import { InputError, PersistenceError } from "../../errors.js";
import type { DailyContentDraft } from "../../types.js";
import type { Driver } from "../driver.js";

// ---------------------------------------------------------------------------
// Mock driver factory
// ---------------------------------------------------------------------------

interface MockTx {
  run: ReturnType<typeof vi.fn>;
}

function createMockDriver() {
  const mockTx: MockTx = { run: vi.fn() };

  const session = {
    executeWrite: vi.fn(async (fn: (tx: MockTx) => Promise<unknown>) => {
      return fn(mockTx);
    }),
    executeRead: vi.fn(async (fn: (tx: MockTx) => Promise<unknown>) => {
      return fn(mockTx);
    }),
    close: vi.fn(async () => {}),
  };

  const driver = { session: vi.fn(() => session) };

  return {
    driver: driver as unknown as Driver,
    session,
    mockTx,
  };
}

function mockRecord(data: Record<string, unknown>) {
  return {
    get: (key: string) => data[key],
  };
}

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const DRAFT: DailyContentDraft = {
  date: "13-10-2025",
  sections: [
    { index: 0, title: "Monsoon Outlook", content: ["Above normal"], importance: "important" },
  ],
  cards: [
    {
      title: "Monsoon",
      gs_tags: ["GS1"],
      tags: [],
      summary: "Rain above normal.",
      section_index: 0,
      section_title: "Monsoon Outlook",
    },
  ],
  mindmap: {
    mindmaps: [
      { title: "Monsoon", nodes: [{ name: "Rain" }], section_index: 0, section_title: "Monsoon Outlook" },
    ],
  },
  pyq: { prelims: [], mains: [] },
};

const CREATED = Date.UTC(2025, 9, 13, 6, 0, 0);
const UPDATED = Date.UTC(2025, 9, 14, 7, 30, 0);

function storedRow(overrides: Record<string, unknown> = {}) {
  return mockRecord({
    date: DRAFT.date,
    sections: JSON.stringify(DRAFT.sections),
    cards: JSON.stringify(DRAFT.cards),
    mindmap: JSON.stringify(DRAFT.mindmap),
    pyq: JSON.stringify(DRAFT.pyq),
    overall_review: null,
    created_at_ms: neo4j.int(CREATED),
    updated_at_ms: neo4j.int(UPDATED),
    ...overrides,
  });
}

// ---------------------------------------------------------------------------
// toDailyAggregate
// ---------------------------------------------------------------------------

describe("toDailyAggregate", () => {
  it("parses JSON fields and converts timestamps to ISO strings", () => {
    expect(toDailyAggregate(storedRow())).toEqual({
      ...DRAFT,
      created_at: "2025-10-13T06:00:00.000Z",
      updated_at: "2025-10-14T07:30:00.000Z",
    });
  });

  it("includes the overall review when one was stored", () => {
    const review = { total_issues: 1, total_corrections: 0, average_accuracy: 0.5 };
    const aggregate = toDailyAggregate(storedRow({ overall_review: JSON.stringify(review) }));

    expect(aggregate.overall_review).toEqual(review);
  });

  it("rejects a row with corrupt JSON", () => {
    expect(() => toDailyAggregate(storedRow({ cards: "[{" }))).toThrow(
      'Stored field "cards" is not valid JSON',
    );
  });

  it("rejects a row that does not match the aggregate schema", () => {
    expect(() =>
      toDailyAggregate(storedRow({ cards: JSON.stringify([{ title: "no provenance" }]) })),
    ).toThrow(PersistenceError);
  });
});

// ---------------------------------------------------------------------------
// Store operations
// ---------------------------------------------------------------------------

describe("Neo4j content store", () => {
  it("upserts the aggregate as JSON fields with a sortable day", async () => {
    const { driver, session, mockTx } = createMockDriver();
    mockTx.run.mockResolvedValue({
      records: [mockRecord({ created_at_ms: neo4j.int(CREATED), updated_at_ms: neo4j.int(UPDATED) })],
    });
    const store = createNeo4jContentStore(driver, { now: () => UPDATED });

    const timestamps = await store.upsert(DRAFT);

    expect(timestamps).toEqual({
      created_at: "2025-10-13T06:00:00.000Z",
      updated_at: "2025-10-14T07:30:00.000Z",
    });
    const [query, params] = mockTx.run.mock.calls[0] ?? [];
    expect(query).toContain("MERGE (d:DailyContent {date: $date})");
    expect(query).toContain("ON CREATE SET d.created_at_ms = $now");
    expect(params).toEqual({
      date: "13-10-2025",
      day: 20251013,
      now: UPDATED,
      sections: JSON.stringify(DRAFT.sections),
      cards: JSON.stringify(DRAFT.cards),
      mindmap: JSON.stringify(DRAFT.mindmap),
      pyq: JSON.stringify(DRAFT.pyq),
      overallReview: null,
    });
    expect(session.executeWrite).toHaveBeenCalledTimes(1);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it("returns null for a date with no document", async () => {
    const { driver, mockTx } = createMockDriver();
    mockTx.run.mockResolvedValue({ records: [] });
    const store = createNeo4jContentStore(driver);

    expect(await store.get("01-01-2025")).toBeNull();
    expect(mockTx.run.mock.calls[0]?.[1]).toEqual({ date: "01-01-2025" });
  });

  it("lists dates newest first in calendar order", async () => {
    const { driver, mockTx } = createMockDriver();
    mockTx.run.mockResolvedValue({
      records: ["13-10-2025", "02-11-2024", "01-12-2025"].map((date) => mockRecord({ date })),
    });
    const store = createNeo4jContentStore(driver);

    expect(await store.listDates()).toEqual(["01-12-2025", "13-10-2025", "02-11-2024"]);
  });

  it("queries a range by day number", async () => {
    const { driver, mockTx } = createMockDriver();
    mockTx.run.mockResolvedValue({ records: [storedRow()] });
    const store = createNeo4jContentStore(driver);

    const items = await store.listRange("01-10-2025", "31-10-2025");

    expect(items.map((i) => i.date)).toEqual(["13-10-2025"]);
    expect(mockTx.run.mock.calls[0]?.[1]).toEqual({ from: 20251001, to: 20251031 });
  });

  it("rejects a range whose start is after its end", async () => {
    const { driver, mockTx } = createMockDriver();
    const store = createNeo4jContentStore(driver);

    await expect(store.listRange("31-10-2025", "01-10-2025")).rejects.toBeInstanceOf(InputError);
    expect(mockTx.run).not.toHaveBeenCalled();
  });

  it("reports whether delete removed a document", async () => {
    const { driver, mockTx } = createMockDriver();
    mockTx.run
      .mockResolvedValueOnce({ records: [mockRecord({ date: "13-10-2025" })] })
      .mockResolvedValueOnce({ records: [] });
    const store = createNeo4jContentStore(driver);

    expect(await store.delete("13-10-2025")).toBe(true);
    expect(await store.delete("13-10-2025")).toBe(false);
  });

  it("wraps driver errors in PersistenceError and still closes the session", async () => {
    const { driver, session, mockTx } = createMockDriver();
    mockTx.run.mockRejectedValue(new Error("ServiceUnavailable"));
    const store = createNeo4jContentStore(driver);

    await expect(store.upsert(DRAFT)).rejects.toThrow(
      new PersistenceError("upsertDailyContent failed: ServiceUnavailable"),
    );
    expect(session.close).toHaveBeenCalledTimes(1);
  });
});
