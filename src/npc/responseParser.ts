/**
 * Parses the backend's three-part reply into an engine-consumable record.
 *
 * Expected shape (markers in order, each optional):
 *   [ANALYSIS]
 *   ...internal monologue...
 *   [ACTION]
 *   GRANT_ACCESS: Player; LEVEL: 2
 *   [DIALOGUE]
 *   ...spoken line...
 *
 * Never throws: malformed input degrades to defaults, unexpected failures
 * to PARSE_FAILURE_RECORD.
 */

import { log } from "../utils/logger.js";

const parserLog = log.withScope("parser");

export type InteractionAction = {
  type: string;
  target: string;
  parameter: string;
  value: string;
};

export type InteractionRecord = {
  analysis: string;
  action: InteractionAction;
  dialogue: string;
};

const ANALYSIS_MARKER = "[ANALYSIS]";
const ACTION_MARKER = "[ACTION]";
const DIALOGUE_MARKER = "[DIALOGUE]";

const KEYED_FIELDS = new Map<string, keyof InteractionAction>([
  ["ACTION_TYPE", "type"],
  ["TARGET", "target"],
  ["PARAMETER", "parameter"],
  ["VALUE", "value"],
]);

export const NO_ACTION: Readonly<InteractionAction> = Object.freeze({
  type: "NO_ACTION",
  target: "None",
  parameter: "None",
  value: "None",
});

export const PARSE_FAILURE_RECORD: Readonly<InteractionRecord> = Object.freeze({
  analysis: "Response parsing failed; no analysis could be recovered.",
  action: Object.freeze({ type: "NO_ACTION", target: "Parsing", parameter: "Failure", value: "N/A" }),
  dialogue: "(The NPC's reply could not be understood.)",
});

type Pair = { key: string; value: string; colons: number };

function toPair(segment: string): Pair | null {
  const idx = segment.indexOf(":");
  if (idx < 0) return null;
  return {
    key: segment.slice(0, idx).trim(),
    value: segment.slice(idx + 1).trim(),
    colons: segment.split(":").length - 1,
  };
}

function assign(action: InteractionAction, field: keyof InteractionAction, value: string): void {
  if (value) {
    action[field] = value;
  }
}

function parseKeyed(pairs: Pair[]): InteractionAction {
  const action: InteractionAction = { ...NO_ACTION };
  for (const pair of pairs) {
    const field = KEYED_FIELDS.get(pair.key.toUpperCase());
    if (field) {
      assign(action, field, pair.value);
    }
  }
  return action;
}

export function parseActionLine(line: string): InteractionAction {
  const segments = line
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  const pairs = segments
    .map(toPair)
    .filter((p): p is Pair => p !== null);

  const hasKeyedType = pairs.some((p) => p.key.toUpperCase() === "ACTION_TYPE");
  const preferredShape =
    segments.length === 2 && pairs.length === 2 && pairs.every((p) => p.colons === 1);

  if (preferredShape && !hasKeyedType) {
    const [head, tail] = pairs;
    const action: InteractionAction = { ...NO_ACTION };
    assign(action, "type", head.key);
    assign(action, "target", head.value);
    assign(action, "parameter", tail.key);
    assign(action, "value", tail.value);
    return action;
  }

  return parseKeyed(pairs);
}

function between(raw: string, start: number, startMarker: string, end: number): string {
  return raw.slice(start + startMarker.length, end).trim();
}

function parseSections(raw: string): InteractionRecord {
  const analysisAt = raw.indexOf(ANALYSIS_MARKER);
  const actionAt = raw.indexOf(ACTION_MARKER);
  const dialogueAt = raw.indexOf(DIALOGUE_MARKER);

  const analysis =
    analysisAt !== -1 && actionAt !== -1 ? between(raw, analysisAt, ANALYSIS_MARKER, actionAt) : "";

  const action =
    actionAt !== -1 && dialogueAt !== -1
      ? parseActionLine(between(raw, actionAt, ACTION_MARKER, dialogueAt))
      : { ...NO_ACTION };

  const dialogue =
    dialogueAt !== -1 ? raw.slice(dialogueAt + DIALOGUE_MARKER.length).trim() : "";

  return { analysis, action, dialogue };
}

export function parseInteractionResponse(raw: string | null | undefined): InteractionRecord {
  try {
    if (typeof raw !== "string") {
      throw new TypeError(`Expected response text, got ${raw === null ? "null" : typeof raw}`);
    }
    const record = parseSections(raw);
    if (record.action.type === NO_ACTION.type && !record.analysis && !record.dialogue) {
      parserLog.warn("Response contained no recognizable sections", { chars: raw.length });
    }
    return record;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    parserLog.error(`Response parsing failed: ${message}`);
    return {
      analysis: PARSE_FAILURE_RECORD.analysis,
      action: { ...PARSE_FAILURE_RECORD.action },
      dialogue: PARSE_FAILURE_RECORD.dialogue,
    };
  }
}

export function isParseFailure(record: InteractionRecord): boolean {
  const failure = PARSE_FAILURE_RECORD.action;
  return (
    record.action.type === failure.type &&
    record.action.target === failure.target &&
    record.action.parameter === failure.parameter &&
    record.action.value === failure.value
  );
}
