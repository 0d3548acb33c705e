export {
  type PromptLibrary,
  type RenderedPrompt,
  createPromptLibrary,
  DEFAULT_PROMPT_DIR,
} from "./library.js";
