import OpenAI from "openai";
import { log } from "../utils/logger.js";

const llmLog = log.withScope("llm");

export type ChatSettings = {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
};

const clients = new Map<string, OpenAI>();

export function getOpenAIClient(apiKey: string | undefined): OpenAI {
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY not configured in .env");
  }
  let client = clients.get(apiKey);
  if (!client) {
    client = new OpenAI({ apiKey });
    clients.set(apiKey, client);
  }
  return client;
}

export async function chat(
  settings: ChatSettings,
  opts: {
    systemPrompt: string;
    userMessage: string;
    client?: OpenAI;
  }
): Promise<string> {
  const client = opts.client ?? getOpenAIClient(settings.apiKey);

  try {
    const response = await client.chat.completions.create({
      model: settings.model,
      temperature: settings.temperature,
      max_tokens: settings.maxTokens,
      messages: [
        { role: "system", content: opts.systemPrompt },
        { role: "user", content: opts.userMessage },
      ],
    });

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new Error("Empty response from OpenAI");
    }

    return content;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    llmLog.error(`OpenAI API error: ${message}`);
    throw new Error("LLM request failed: " + message);
  }
}
