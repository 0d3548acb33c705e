import { describe, expect, it } from "vitest";
import { GenerationError } from "@dailysync/shared";
import { generateCards } from "../cards.js";
import { generateMindmap } from "../mindmap.js";
import { generateQuestions } from "../questions.js";
import type { GeneratorDeps } from "../payload.js";
import {
  captureLogger,
  createScriptedClient,
  fenced,
  testPrompts,
  type ScriptHandler,
} from "../../__tests__/helpers.js";

const prompts = testPrompts();

function deps(
  handlers: Parameters<typeof createScriptedClient>[0],
): GeneratorDeps & { entries: Array<Record<string, unknown>> } {
  const { logger, entries } = captureLogger();
  return { client: createScriptedClient(handlers), prompts, logger, entries };
}

const answer =
  (value: unknown): ScriptHandler =>
  () =>
    fenced(value);

// ---------------------------------------------------------------------------
// Cards
// ---------------------------------------------------------------------------

describe("generateCards", () => {
  it("returns cards that pass strict validation", async () => {
    const d = deps({
      cards: answer([
        {
          title: "Trade pact",
          gs_tags: ["GS2 (IR)"],
          tags: ["trade"],
          summary: "India and the EU resumed talks.",
        },
      ]),
    });

    expect(await generateCards(d, "section text")).toEqual([
      {
        title: "Trade pact",
        gs_tags: ["GS2 (IR)"],
        tags: ["trade"],
        summary: "India and the EU resumed talks.",
      },
    ]);
  });

  it("normalises a comma separated gs field and missing tags", async () => {
    const d = deps({
      cards: answer([{ title: "Monsoon", gs: "GS1, GS3 (Agri)", summary: "Rain above normal." }]),
    });

    expect(await generateCards(d, "section text")).toEqual([
      { title: "Monsoon", gs_tags: ["GS1", "GS3 (Agri)"], tags: [], summary: "Rain above normal." },
    ]);
    expect(d.entries.filter((e) => e.msg === "Generator item warning")).toHaveLength(1);
  });

  it("skips cards that fail both layers", async () => {
    const d = deps({
      cards: answer([
        { title: "No summary" },
        { title: "Kept", gs_tags: [], tags: [], summary: "Fine." },
      ]),
    });

    const cards = await generateCards(d, "section text");

    expect(cards.map((c) => c.title)).toEqual(["Kept"]);
    expect(d.entries.find((e) => e.msg === "Generator item warning")?.warning).toMatch(
      /^Card 0: skipped/,
    );
  });

  it("drops a section_index the model invents", async () => {
    const d = deps({
      cards: answer([
        { title: "T", gs_tags: [], tags: [], summary: "S", section_index: 9 },
      ]),
    });

    const [card] = await generateCards(d, "section text");

    expect(card).toEqual({ title: "T", gs_tags: [], tags: [], summary: "S" });
  });

  it("rejects a payload that is not an array", async () => {
    const d = deps({ cards: answer({ cards: [] }) });

    await expect(generateCards(d, "section text")).rejects.toThrow(
      new GenerationError("cards", "payload is not a JSON array"),
    );
  });

  it("wraps an unparseable response", async () => {
    const d = deps({ cards: () => "Sorry, no cards today." });

    const error = await generateCards(d, "section text").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toHaveProperty("task", "cards");
  });
});

// ---------------------------------------------------------------------------
// Mindmap
// ---------------------------------------------------------------------------

describe("generateMindmap", () => {
  it("returns a nested mind map", async () => {
    const mindmap = {
      title: "Monsoon",
      nodes: [{ name: "Causes", children: [{ name: "El Nino" }] }],
    };
    const d = deps({ mindmap: answer(mindmap) });

    expect(await generateMindmap(d, "section text")).toEqual(mindmap);
  });

  it("returns null for JSON that is not a mind map", async () => {
    const d = deps({ mindmap: answer(["not", "a", "mindmap"]) });

    expect(await generateMindmap(d, "section text")).toBeNull();
    expect(d.entries.some((e) => e.msg === "Mindmap payload rejected")).toBe(true);
  });

  it("throws for a response with no JSON", async () => {
    const d = deps({ mindmap: () => "```json\n```" });

    await expect(generateMindmap(d, "section text")).rejects.toThrow(
      "mindmap: Fenced block is empty",
    );
  });
});

// ---------------------------------------------------------------------------
// Questions
// ---------------------------------------------------------------------------

describe("generateQuestions", () => {
  it("validates prelims and mains separately", async () => {
    const d = deps({
      questions: answer({
        prelims: [
          {
            question: "Which body issues the monsoon forecast?",
            options: { a: "IMD", b: "ISRO", c: "NITI Aayog", d: "RBI" },
            correct_answer: "a",
            year: 2019,
          },
          { question: "Bad answer label", options: { a: "x", b: "y" }, correct_answer: "e" },
        ],
        mains: [{ question: "Discuss the monsoon's role in agriculture.", type: "10 marks" }],
      }),
    });

    const questions = await generateQuestions(d, "section text");

    expect(questions.prelims).toEqual([
      {
        question: "Which body issues the monsoon forecast?",
        options: { a: "IMD", b: "ISRO", c: "NITI Aayog", d: "RBI" },
        correct_answer: "a",
        year: "2019",
      },
    ]);
    expect(questions.mains).toEqual([
      { question: "Discuss the monsoon's role in agriculture.", marks: "10 marks" },
    ]);
  });

  it("treats missing lists as empty", async () => {
    const d = deps({ questions: answer({}) });

    expect(await generateQuestions(d, "section text")).toEqual({ prelims: [], mains: [] });
  });

  it("rejects a payload that is not an object", async () => {
    const d = deps({ questions: answer([]) });

    await expect(generateQuestions(d, "section text")).rejects.toThrow(
      "questions: payload is not a JSON object",
    );
  });

  it("rejects lists of the wrong type", async () => {
    const d = deps({ questions: answer({ prelims: "none" }) });

    await expect(generateQuestions(d, "section text")).rejects.toBeInstanceOf(
      GenerationError,
    );
  });
});
