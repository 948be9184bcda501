import type { MemoryLedger } from "../npc/memoryLedger.js";
import { renderPersonaContext, type PersonaState } from "../npc/personaState.js";
import { log } from "../utils/logger.js";

const llmLog = log.withScope("llm");

export type NpcPrompt = {
  /** Persona context, memory transcript and long-term note. */
  systemPrompt: string;
  /** The raw player input, attributed. */
  userMessage: string;
  /** systemPrompt and userMessage as one blob, for single-text backends. */
  text: string;
};

export function buildLongTermNote(count: number): string {
  if (count <= 0) return "";
  return count === 1
    ? "1 older memory is archived in long-term memory."
    : `${count} older memories are archived in long-term memory.`;
}

export function buildUserMessage(opts: {
  playerName: string;
  content: string;
}): string {
  return `${opts.playerName}: ${opts.content}`;
}

export function buildNpcPrompt(opts: {
  state: PersonaState;
  ledger: MemoryLedger;
  playerName: string;
  playerInput: string;
}): NpcPrompt {
  const transcript = opts.ledger.renderTranscript();
  const longTermNote = buildLongTermNote(opts.ledger.longTermCount());

  const systemPrompt = [renderPersonaContext(opts.state), transcript, longTermNote]
    .filter((part) => part.length > 0)
    .join("\n\n");

  const userMessage = buildUserMessage({ playerName: opts.playerName, content: opts.playerInput });

  llmLog.debug(
    `Built prompt for ${opts.state.name}: ${systemPrompt.length} system chars, ` +
      `${opts.ledger.size()} short-term / ${opts.ledger.longTermCount()} long-term memories`
  );

  return {
    systemPrompt,
    userMessage,
    text: `${systemPrompt}\n\n${userMessage}`,
  };
}
