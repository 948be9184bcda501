export * from "./npc/traits.js";
export * from "./npc/errors.js";
export * from "./npc/personaState.js";
export * from "./npc/statePolicy.js";
export * from "./npc/memoryLedger.js";
export * from "./npc/responseParser.js";
export * from "./npc/orchestrator.js";
export { buildNpcPrompt, buildLongTermNote, buildUserMessage, type NpcPrompt } from "./llm/prompts.js";
export {
  createResponseGenerator,
  getResponderInfo,
  type GenerationRequest,
  type ResponseGenerator,
} from "./llm/responders/provider.js";
export {
  createKeywordSentiment,
  loadSentimentLexicon,
  defaultLexiconPath,
  type LexiconEntry,
  type SentimentEstimator,
} from "./sentiment/keywordSentiment.js";
export { loadPersonaSeeds, getPersonaSeed, type PersonaSeed } from "./personas/index.js";
export type { Config, ResponderKind } from "./config/types.js";
