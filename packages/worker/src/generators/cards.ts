import {
  CardDraftLenientSchema,
  CardDraftSchema,
  GenerationError,
  type CardDraft,
} from "@dailysync/shared";
import {
  logWarnings,
  requestPayload,
  validateItems,
  type GeneratorDeps,
} from "./payload.js";

/** Summary cards for one section. Invalid cards are dropped, not fatal. */
export async function generateCards(
  deps: GeneratorDeps,
  sectionText: string,
): Promise<CardDraft[]> {
  const payload = await requestPayload(deps, "cards", { CONTENT: sectionText });
  if (!Array.isArray(payload)) {
    throw new GenerationError("cards", "payload is not a JSON array");
  }

  const { items, warnings } = validateItems(
    payload,
    "Card",
    CardDraftSchema,
    CardDraftLenientSchema,
  );
  logWarnings(deps.logger, "cards", warnings);
  return items;
}
