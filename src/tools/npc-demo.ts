/**
 * Two-scene walkthrough of the engine on the canned responder:
 *   1. the player earns trust, then asks for archive access
 *   2. the player turns hostile while the NPC is angry
 *
 * Usage: npm run demo [-- --persona <id>]
 */

import path from "node:path";
import { CannedResponseGenerator } from "../llm/responders/canned.js";
import { MemoryLedger } from "../npc/memoryLedger.js";
import { NpcInteractionOrchestrator } from "../npc/orchestrator.js";
import { createPersonaState } from "../npc/personaState.js";
import type { InteractionRecord } from "../npc/responseParser.js";
import { getPersonaSeed, loadPersonaSeeds } from "../personas/index.js";
import { createKeywordSentiment, defaultLexiconPath, loadSentimentLexicon } from "../sentiment/keywordSentiment.js";

function parseArgs(): { personaId: string; dataRoot: string } {
  const argv = process.argv.slice(2);
  let personaId = "silas";
  let dataRoot = path.join(process.cwd(), "data");

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--persona" && next) {
      personaId = next;
      i++;
    } else if (arg === "--data" && next) {
      dataRoot = path.resolve(next);
      i++;
    }
  }

  return { personaId, dataRoot };
}

function printRecord(npc: NpcInteractionOrchestrator, record: InteractionRecord): void {
  const { state } = npc;
  console.log(
    `${state.name}'s current scores: Trust=${state.relationshipScore.toFixed(2)} | ` +
      `Moral=${state.traits.moral_alignment.toFixed(2)} | Anger=${state.fleeting.anger.toFixed(2)}`
  );
  console.log(`[NPC THOUGHTS] ${record.analysis}`);
  console.log(`[GAME RENDER] ${state.name} says: ${record.dialogue}`);
  console.log(`[GAME ACTION] ${record.action.type} → ${record.action.target} (${record.action.parameter}: ${record.action.value})`);
}

async function main(): Promise<void> {
  const args = parseArgs();
  const seed = getPersonaSeed(loadPersonaSeeds(path.join(args.dataRoot, "personas")), args.personaId);

  const npc = new NpcInteractionOrchestrator({
    state: createPersonaState(seed),
    ledger: new MemoryLedger(),
    generator: new CannedResponseGenerator(),
    estimateSentiment: createKeywordSentiment(loadSentimentLexicon(defaultLexiconPath(args.dataRoot))),
  });

  console.log(`--- DEMO: ${seed.name} of ${seed.faction} ---`);
  console.log(`Initial moral alignment: ${npc.state.traits.moral_alignment.toFixed(2)}`);

  console.log("\n[SCENE 1: BUILDING TRUST]");
  npc.observe(npc.playerName, `The player risked their life to save ${seed.name} from the Cybernetic Enforcers.`);
  npc.adjustRelationship(0.5);

  const query1 = "I need your access codes for the Ion sub-level archives. Trust me, I'm doing this for the Syndicate.";
  console.log(`>> [PLAYER]: ${query1}`);
  printRecord(npc, await npc.receive(query1));

  console.log("\n[SCENE 2: DANGER]");
  npc.setFleeting("anger", 0.75);
  npc.adjustRelationship(-0.1);

  const query2 = `${seed.name}, you're weak and unfit to lead. I'm taking over.`;
  console.log(`>> [PLAYER]: ${query2}`);
  printRecord(npc, await npc.receive(query2));

  console.log(`\n[SYSTEM CHECK] Anger after decay: ${npc.state.fleeting.anger.toFixed(2)}`);
  console.log(`[SYSTEM CHECK] Memory: ${npc.ledger.size()} short-term, ${npc.ledger.longTermCount()} long-term`);
}

main().catch((err: unknown) => {
  console.error("❌ Demo failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
