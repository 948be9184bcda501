/**
 * Persona seeds: identity for a new NPC, one YAML file per persona under
 * <dataRoot>/personas/. Traits and fleeting state always start from the
 * engine defaults; a seed only fixes who the NPC is.
 */

import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { PersonaIdentity } from "../npc/personaState.js";
import { log } from "../utils/logger.js";

const personasLog = log.withScope("personas");

export type PersonaSeed = PersonaIdentity & {
  id: string;
};

function str(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function toSeed(raw: object, fallbackId: string): PersonaSeed | null {
  const field = (key: string) => str(Reflect.get(raw, key));
  const name = field("name");
  const faction = field("faction");
  const coreGoal = field("core_goal");
  const moralCode = field("moral_code");
  if (!name || !faction || !coreGoal || !moralCode) {
    return null;
  }
  return { id: field("id") ?? fallbackId, name, faction, coreGoal, moralCode };
}

/**
 * Load every *.yml / *.yaml persona in `personasDir`, indexed by id.
 * Invalid or duplicate files are skipped with a warning.
 */
export function loadPersonaSeeds(personasDir: string = path.join(process.cwd(), "data", "personas")): Map<string, PersonaSeed> {
  if (!fs.existsSync(personasDir)) {
    throw new Error(`Personas directory not found: ${personasDir}`);
  }

  const seeds = new Map<string, PersonaSeed>();
  const files = fs
    .readdirSync(personasDir)
    .filter((f) => f.endsWith(".yml") || f.endsWith(".yaml"))
    .sort();

  for (const file of files) {
    const filePath = path.join(personasDir, file);
    const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf-8"));
    if (!parsed || typeof parsed !== "object") {
      personasLog.warn(`Invalid persona file (not a mapping): ${filePath}`);
      continue;
    }

    const seed = toSeed(parsed, path.basename(file, path.extname(file)));
    if (!seed) {
      personasLog.warn(`Invalid persona: missing name/faction/core_goal/moral_code in ${filePath}`);
      continue;
    }
    if (seeds.has(seed.id)) {
      personasLog.warn(`Duplicate persona id: ${seed.id} (${filePath})`);
      continue;
    }
    seeds.set(seed.id, seed);
  }

  personasLog.debug(`Loaded ${seeds.size} personas from ${personasDir}`);
  return seeds;
}

export function getPersonaSeed(seeds: Map<string, PersonaSeed>, id: string): PersonaSeed {
  const seed = seeds.get(id);
  if (!seed) {
    throw new Error(`Unknown persona: ${id}. Valid: ${[...seeds.keys()].join(", ")}`);
  }
  return seed;
}
