import type {
  Card,
  CardDraft,
  DailyContentDraft,
  MainsQuestion,
  Mindmap,
  MindmapDraft,
  PrelimsQuestion,
  Provenance,
  QuestionSetDraft,
  Section,
} from "@dailysync/shared";

// Every function here builds new records; drafts are never modified.

export function provenanceOf(section: Section): Provenance {
  return { section_index: section.index, section_title: section.title };
}

export function tagCards(section: Section, drafts: CardDraft[]): Card[] {
  const provenance = provenanceOf(section);
  return drafts.map((draft) => ({ ...draft, ...provenance }));
}

/** A missing mind map becomes an empty placeholder so indices stay aligned. */
export function tagMindmap(
  section: Section,
  draft: MindmapDraft | null,
): Mindmap {
  const provenance = provenanceOf(section);
  if (draft === null) {
    return { title: section.title, nodes: [], placeholder: true, ...provenance };
  }
  return { ...draft, ...provenance };
}

export function tagQuestions(
  section: Section,
  drafts: QuestionSetDraft,
): { prelims: PrelimsQuestion[]; mains: MainsQuestion[] } {
  const provenance = provenanceOf(section);
  return {
    prelims: drafts.prelims.map((q) => ({ ...q, ...provenance })),
    mains: drafts.mains.map((q) => ({ ...q, ...provenance })),
  };
}

/** Lists every artifact whose provenance does not match its section. */
export function findProvenanceViolations(draft: DailyContentDraft): string[] {
  const violations: string[] = [];

  const check = (kind: string, position: number, p: Provenance): void => {
    const section = draft.sections[p.section_index];
    if (!section) {
      violations.push(`${kind}[${position}] points at missing section ${p.section_index}`);
    } else if (section.title !== p.section_title) {
      violations.push(
        `${kind}[${position}] title "${p.section_title}" does not match section ${p.section_index}`,
      );
    }
  };

  draft.cards.forEach((card, i) => check("cards", i, card));
  draft.mindmap.mindmaps.forEach((mindmap, i) => check("mindmaps", i, mindmap));
  draft.pyq.prelims.forEach((q, i) => check("prelims", i, q));
  draft.pyq.mains.forEach((q, i) => check("mains", i, q));

  return violations;
}
