import path from "node:path";
import * as readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { loadConfig, printConfigSnapshot } from "../config/env.js";
import { createResponseGenerator, getResponderInfo } from "../llm/responders/provider.js";
import { MemoryLedger } from "../npc/memoryLedger.js";
import { NpcInteractionOrchestrator } from "../npc/orchestrator.js";
import { createPersonaState, type PersonaState } from "../npc/personaState.js";
import { getPersonaSeed, loadPersonaSeeds } from "../personas/index.js";
import { createKeywordSentiment, defaultLexiconPath, loadSentimentLexicon } from "../sentiment/keywordSentiment.js";

/**
 * Interactive chat with one NPC, using the responder chosen by NPC_RESPONDER.
 *
 * Commands:
 *   /state   print traits, fleeting state, relationship and memory counts
 *   /quit    exit
 */

function formatState(state: PersonaState, ledger: MemoryLedger): string {
  const traits = Object.entries(state.traits)
    .map(([k, v]) => `${k}=${v.toFixed(2)}`)
    .join(" ");
  const fleeting = Object.entries(state.fleeting)
    .map(([k, v]) => `${k}=${v.toFixed(2)}`)
    .join(" ");
  return [
    `  traits:       ${traits}`,
    `  fleeting:     ${fleeting}`,
    `  relationship: ${state.relationshipScore.toFixed(2)}`,
    `  memory:       ${ledger.size()}/${ledger.capacity} short-term, ${ledger.longTermCount()} long-term`,
  ].join("\n");
}

async function main(): Promise<void> {
  const cfg = loadConfig();
  if (process.argv.includes("--show-config")) {
    printConfigSnapshot(cfg);
  }

  const dataRoot = path.resolve(cfg.data.root);
  const seed = getPersonaSeed(loadPersonaSeeds(path.join(dataRoot, "personas")), cfg.npc.personaId);
  const ledger = new MemoryLedger(cfg.npc.shortTermLimit);

  const npc = new NpcInteractionOrchestrator({
    state: createPersonaState(seed),
    ledger,
    generator: await createResponseGenerator(cfg),
    estimateSentiment: createKeywordSentiment(loadSentimentLexicon(defaultLexiconPath(dataRoot))),
    playerName: cfg.npc.playerName,
    turnDecay: cfg.npc.turnDecay,
  });

  console.log(`💬 Talking to ${seed.name} (${seed.faction})`);
  console.log(`   Responder: ${getResponderInfo(cfg).description}`);
  console.log(`   Type /state to inspect, /quit to leave.\n`);

  const rl = readline.createInterface({ input, output });
  try {
    while (true) {
      const line = (await rl.question(`${cfg.npc.playerName}> `)).trim();
      if (!line) continue;
      if (line === "/quit") break;
      if (line === "/state") {
        console.log(formatState(npc.state, ledger));
        continue;
      }

      const record = await npc.receive(line);
      console.log(`\n${seed.name}: ${record.dialogue || "(says nothing)"}`);
      console.log(`  ⚙ ${record.action.type} → ${record.action.target} (${record.action.parameter}: ${record.action.value})`);
      console.log(`  relationship ${npc.state.relationshipScore.toFixed(2)}\n`);
    }
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  console.error("❌", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
