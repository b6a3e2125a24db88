export {
  buildClassificationSystemPrompt,
  buildClassificationUserPrompt,
  formatHistory
} from "./classification.js";
export type { OrganizationProfile } from "./classification.js";
export {
  NO_ANSWER_TEXT,
  buildAnswerSystemPrompt,
  buildGeneralSystemPrompt,
  formatChunkContext,
  indicatesNoAnswer
} from "./answer.js";
