/**
 * Live generator: forwards the built prompt to OpenAI chat completions.
 */

import type OpenAI from "openai";
import { chat, type ChatSettings } from "../client.js";
import type { GenerationRequest, ResponseGenerator } from "./provider.js";

export class OpenAiResponseGenerator implements ResponseGenerator {
  constructor(
    private settings: ChatSettings,
    private client?: OpenAI
  ) {}

  async generate(request: GenerationRequest): Promise<string> {
    return chat(this.settings, {
      systemPrompt: request.prompt.systemPrompt,
      userMessage: request.prompt.userMessage,
      client: this.client,
    });
  }
}
