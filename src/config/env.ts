import "dotenv/config";
import type { Config, LogFormat, LogLevel, ResponderKind } from "./types.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optInt(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`Invalid integer for ${name}: ${v}`);
  return n;
}

function optFloat(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`Invalid number for ${name}: ${v}`);
  return n;
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((a) => a === v);
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

export function loadConfig(): Config {
  const responder = enumOf<ResponderKind>("NPC_RESPONDER", ["canned", "openai"] as const, "canned");
  const apiKey = opt("OPENAI_API_KEY");
  if (responder === "openai" && !apiKey) {
    throw new Error("Missing required env var: OPENAI_API_KEY (NPC_RESPONDER=openai)");
  }

  const shortTermLimit = optInt("NPC_SHORT_TERM_LIMIT", 15);
  if (shortTermLimit < 1) {
    throw new Error(`NPC_SHORT_TERM_LIMIT must be at least 1, got ${shortTermLimit}`);
  }

  const turnDecay = optFloat("NPC_TURN_DECAY", 0.15);
  if (turnDecay < 0) {
    throw new Error(`NPC_TURN_DECAY must be at least 0, got ${turnDecay}`);
  }

  const cfg: Config = {
    responder,

    openai: {
      apiKey,
    },

    llm: {
      model: opt("LLM_MODEL") ?? "gpt-4o-mini",
      temperature: optFloat("LLM_TEMPERATURE", 0.7),
      maxTokens: optInt("LLM_MAX_TOKENS", 600),
    },

    npc: {
      personaId: opt("NPC_PERSONA") ?? "silas",
      playerName: opt("NPC_PLAYER_NAME") ?? "Player",
      shortTermLimit,
      turnDecay,
    },

    data: {
      root: opt("DATA_ROOT") ?? "./data",
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };

  return cfg;
}

const SECRET_KEYS: readonly string[] = ["OPENAI_API_KEY"];

/** Copy of a snapshot with every secret key's value masked, at any depth. */
export function redactConfigSnapshot(snapshot: unknown): unknown {
  if (Array.isArray(snapshot)) return snapshot.map(redactConfigSnapshot);
  if (!snapshot || typeof snapshot !== "object") return snapshot;

  return Object.fromEntries(
    Object.entries(snapshot).map(([key, value]) => [
      key,
      SECRET_KEYS.includes(key) ? (value === undefined ? undefined : "<redacted>") : redactConfigSnapshot(value),
    ])
  );
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = redactConfigSnapshot({
    NPC_RESPONDER: cfg.responder,
    OPENAI_API_KEY: cfg.openai.apiKey,
    LLM_MODEL: cfg.llm.model,
    LLM_TEMPERATURE: cfg.llm.temperature,
    LLM_MAX_TOKENS: cfg.llm.maxTokens,
    NPC_PERSONA: cfg.npc.personaId,
    NPC_PLAYER_NAME: cfg.npc.playerName,
    NPC_SHORT_TERM_LIMIT: cfg.npc.shortTermLimit,
    NPC_TURN_DECAY: cfg.npc.turnDecay,
    DATA_ROOT: cfg.data.root,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  });

  console.log("=== NPC CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(snap, null, 2));
  console.log("===========================");
}
