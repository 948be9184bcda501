import { expect, test } from "vitest";
import { TRUST_REPLY } from "../../llm/responders/canned.js";
import {
  isParseFailure,
  NO_ACTION,
  PARSE_FAILURE_RECORD,
  parseActionLine,
  parseInteractionResponse,
} from "../../npc/responseParser.js";

test("parses the three sections in the preferred action form", () => {
  const record = parseInteractionResponse("[ANALYSIS]\nA\n[ACTION]\nGRANT: Player; LEVEL: 2\n[DIALOGUE]\nHello");

  expect(record).toEqual({
    analysis: "A",
    action: { type: "GRANT", target: "Player", parameter: "LEVEL", value: "2" },
    dialogue: "Hello",
  });
});

test("keyed action form assigns recognized keys", () => {
  const record = parseInteractionResponse(
    "[ANALYSIS]\nplan\n[ACTION]\nACTION_TYPE: BETRAY; TARGET: Player\n[DIALOGUE]\nGoodbye."
  );

  expect(record.action).toEqual({ type: "BETRAY", target: "Player", parameter: "None", value: "None" });
  expect(record.analysis).toBe("plan");
  expect(record.dialogue).toBe("Goodbye.");
});

test("keyed scan is case-insensitive and ignores unknown keys", () => {
  expect(parseActionLine("target: Vault; action_type: steal; value: 3; mood: grim")).toEqual({
    type: "steal",
    target: "Vault",
    parameter: "None",
    value: "3",
  });
});

test("two plain pairs use the positional form even when a value names a key", () => {
  expect(parseActionLine("REPORT: Faction_Guardians; TARGET: Player_Location")).toEqual({
    type: "REPORT",
    target: "Faction_Guardians",
    parameter: "TARGET",
    value: "Player_Location",
  });
});

test("action lines without a recognizable shape fall back to NO_ACTION", () => {
  expect(parseActionLine("")).toEqual(NO_ACTION);
  expect(parseActionLine("just some words")).toEqual(NO_ACTION);
  expect(parseActionLine("BETRAY: Player")).toEqual(NO_ACTION);
  expect(parseActionLine("A: b: c; D: e")).toEqual(NO_ACTION);
});

test("missing [ACTION] keeps dialogue and defaults the action", () => {
  const record = parseInteractionResponse("[ANALYSIS]\nthinking\n[DIALOGUE]\nHi there");

  expect(record).toEqual({
    analysis: "",
    action: { type: "NO_ACTION", target: "None", parameter: "None", value: "None" },
    dialogue: "Hi there",
  });
});

test("missing [DIALOGUE] keeps analysis and defaults the action", () => {
  const record = parseInteractionResponse("[ANALYSIS] weighing it [ACTION] GRANT: Player; LEVEL: 1");

  expect(record.analysis).toBe("weighing it");
  expect(record.action).toEqual(NO_ACTION);
  expect(record.dialogue).toBe("");
});

test("only the first occurrence of a marker is used", () => {
  const record = parseInteractionResponse("[DIALOGUE] one [DIALOGUE] two");
  expect(record.dialogue).toBe("one [DIALOGUE] two");
});

test("canned trust reply parses into a grant", () => {
  const record = parseInteractionResponse(TRUST_REPLY);

  expect(record.action).toEqual({ type: "GRANT_ACCESS", target: "Player", parameter: "LEVEL", value: "2" });
  expect(record.analysis.startsWith("- GOAL CHECK:")).toBe(true);
  expect(record.dialogue.startsWith('"Very well, partner.')).toBe(true);
});

test("empty text is not a parse failure", () => {
  const record = parseInteractionResponse("");

  expect(record).toEqual({ analysis: "", action: NO_ACTION, dialogue: "" });
  expect(isParseFailure(record)).toBe(false);
});

test("non-text input returns the failure sentinel", () => {
  const record = parseInteractionResponse(null);

  expect(record).toEqual(PARSE_FAILURE_RECORD);
  expect(record.action).toEqual({ type: "NO_ACTION", target: "Parsing", parameter: "Failure", value: "N/A" });
  expect(isParseFailure(record)).toBe(true);
  expect(isParseFailure(parseInteractionResponse(undefined))).toBe(true);
});

test("garbage input never throws", () => {
  const inputs = [
    "[ACTION]",
    "[DIALOGUE][ACTION][ANALYSIS]",
    ";;;:::",
    "\u0000\u0001[ACTION];;[DIALOGUE]",
    "[ACTION]:;:;:[DIALOGUE]",
    "[ANALYSIS]".repeat(50),
  ];

  for (const raw of inputs) {
    const record = parseInteractionResponse(raw);
    expect(typeof record.analysis).toBe("string");
    expect(typeof record.dialogue).toBe("string");
    expect(typeof record.action.type).toBe("string");
    expect(typeof record.action.value).toBe("string");
  }
});
