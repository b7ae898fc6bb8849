export { RagResponder } from "./responder.js";
export type { RagSettings } from "./responder.js";
export {
  NO_CONTEXT,
  LENGTH_CONSTRAINT,
  buildContext,
  buildRagPrompt,
  buildDebatePrompt,
  buildAnalysisPrompt,
  buildAgenticPrompt,
} from "./prompts.js";
export type { AgenticPromptInput } from "./prompts.js";
