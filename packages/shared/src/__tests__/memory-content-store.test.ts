import { describe, it, expect } from "vitest";
import { createMemoryContentStore } from "../memory-content-store.js";
import { InputError } from "../errors.js";
import type { DailyContentDraft } from "../types.js";

function draft(date: string): DailyContentDraft {
  return {
    date,
    sections: [],
    cards: [],
    mindmap: { mindmaps: [] },
    pyq: { prelims: [], mains: [] },
  };
}

describe("memory content store", () => {
  it("keeps created_at and advances updated_at within one millisecond", async () => {
    const store = createMemoryContentStore({ now: () => Date.UTC(2025, 9, 13) });

    const first = await store.upsert(draft("13-10-2025"));
    const second = await store.upsert(draft("13-10-2025"));

    expect(first).toEqual({
      created_at: "2025-10-13T00:00:00.000Z",
      updated_at: "2025-10-13T00:00:00.000Z",
    });
    expect(second).toEqual({
      created_at: "2025-10-13T00:00:00.000Z",
      updated_at: "2025-10-13T00:00:00.001Z",
    });
  });

  it("does not hand out references to stored documents", async () => {
    const store = createMemoryContentStore();
    await store.upsert(draft("13-10-2025"));

    const copy = await store.get("13-10-2025");
    copy?.sections.push({ index: 0, title: "x", content: [], importance: "important" });

    expect((await store.get("13-10-2025"))?.sections).toEqual([]);
  });

  it("orders dates and ranges chronologically", async () => {
    const store = createMemoryContentStore();
    for (const date of ["02-11-2024", "13-10-2025", "01-12-2025"]) {
      await store.upsert(draft(date));
    }

    expect(await store.listDates()).toEqual(["01-12-2025", "13-10-2025", "02-11-2024"]);
    const range = await store.listRange("01-01-2025", "31-12-2025");
    expect(range.map((d) => d.date)).toEqual(["01-12-2025", "13-10-2025"]);
    await expect(store.listRange("31-12-2025", "01-01-2025")).rejects.toBeInstanceOf(InputError);
  });

  it("reports whether delete removed anything", async () => {
    const store = createMemoryContentStore();
    await store.upsert(draft("13-10-2025"));

    expect(await store.delete("13-10-2025")).toBe(true);
    expect(await store.delete("13-10-2025")).toBe(false);
    expect(await store.get("13-10-2025")).toBeNull();
  });
});
