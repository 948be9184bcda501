export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export type ResponderKind = "canned" | "openai";

export interface Config {
  responder: ResponderKind;

  openai: {
    apiKey?: string;
  };

  llm: {
    model: string;
    temperature: number;
    maxTokens: number;
  };

  npc: {
    personaId: string;
    playerName: string;
    shortTermLimit: number;
    turnDecay: number;
  };

  data: {
    root: string;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
