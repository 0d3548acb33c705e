import { MindmapDraftSchema, type MindmapDraft } from "@dailysync/shared";
import { requestPayload, type GeneratorDeps } from "./payload.js";

/**
 * Mind map for one section. Returns null when the model's JSON does not have
 * the mind map shape; the caller substitutes a placeholder. An unparseable
 * response still throws GenerationError.
 */
export async function generateMindmap(
  deps: GeneratorDeps,
  sectionText: string,
): Promise<MindmapDraft | null> {
  const payload = await requestPayload(deps, "mindmap", {
    CONTENT: sectionText,
  });

  const parsed = MindmapDraftSchema.safeParse(payload);
  if (!parsed.success) {
    deps.logger.warn("Mindmap payload rejected", {
      task: "mindmap",
      error: parsed.error.issues[0]?.message ?? "invalid",
    });
    return null;
  }
  return parsed.data;
}
