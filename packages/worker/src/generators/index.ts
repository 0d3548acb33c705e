export { generateCards } from "./cards.js";
export { generateMindmap } from "./mindmap.js";
export { generateQuestions } from "./questions.js";
export {
  requestPayload,
  validateItems,
  type GeneratorDeps,
  type ValidatedItems,
} from "./payload.js";
