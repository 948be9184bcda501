/**
 * Response generator interface.
 *
 * The orchestrator only ever sees ResponseGenerator; which implementation
 * backs it (canned replies for tests and demos, OpenAI for live play) is the
 * host's choice, made once through createResponseGenerator().
 */

import type { Config, ResponderKind } from "../../config/types.js";
import type { PersonaState } from "../../npc/personaState.js";
import type { NpcPrompt } from "../prompts.js";

export type GenerationRequest = {
  prompt: NpcPrompt;
  /** Frozen snapshot; generators must not mutate NPC state. */
  state: Readonly<PersonaState>;
  playerInput: string;
};

export interface ResponseGenerator {
  /**
   * Produce the raw three-part reply text. May reject; the orchestrator
   * substitutes a fallback reply.
   */
  generate(request: GenerationRequest): Promise<string>;
}

export function getResponderInfo(cfg: Pick<Config, "responder" | "llm">): { name: string; description: string } {
  switch (cfg.responder) {
    case "canned":
      return { name: "canned", description: "fixed demo replies (offline)" };
    case "openai":
      return {
        name: "openai",
        description: `OpenAI chat completions (${cfg.llm.model}, temperature ${cfg.llm.temperature})`,
      };
  }
}

/**
 * Build the configured generator. The OpenAI SDK is only loaded when the
 * openai responder is selected.
 */
export async function createResponseGenerator(
  cfg: Pick<Config, "responder" | "llm" | "openai">
): Promise<ResponseGenerator> {
  const kind: ResponderKind = cfg.responder;
  switch (kind) {
    case "openai": {
      const { OpenAiResponseGenerator } = await import("./openai.js");
      return new OpenAiResponseGenerator({ apiKey: cfg.openai.apiKey, ...cfg.llm });
    }
    case "canned": {
      const { CannedResponseGenerator } = await import("./canned.js");
      return new CannedResponseGenerator();
    }
  }
}
