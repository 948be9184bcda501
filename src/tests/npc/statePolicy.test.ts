import { expect, test } from "vitest";
import { InvalidStateValueError, UnknownFleetingStateError, UnknownTraitError } from "../../npc/errors.js";
import { createPersonaState, type PersonaState } from "../../npc/personaState.js";
import {
  clamp,
  decayFleeting,
  updateFleeting,
  updateMoralAlignment,
  updateRelationship,
  updateTrait,
} from "../../npc/statePolicy.js";
import { FLEETING_STATE_NAMES, TRAIT_NAMES } from "../../npc/traits.js";

function makeState(): PersonaState {
  return createPersonaState({
    name: "Vera",
    faction: "Harbor Watch",
    coreGoal: "Keep the docks quiet",
    moralCode: "Debts are always paid",
  });
}

test("clamp bounds a value to the closed interval", () => {
  expect(clamp(0, 1, 1.4)).toBe(1);
  expect(clamp(0, 1, -0.2)).toBe(0);
  expect(clamp(-1, 1, 0.25)).toBe(0.25);
});

test("updateTrait applies a clamped delta", () => {
  const state = makeState();

  expect(updateTrait(state, "loyalty", 0.2)).toEqual({ before: 0.5, after: 0.7 });
  updateTrait(state, "fear", 5);
  expect(state.traits.fear).toBe(1);
  updateTrait(state, "fear", -5);
  expect(state.traits.fear).toBe(0);
});

test("updateTrait rejects unknown names and leaves state untouched", () => {
  const state = makeState();
  const before = { ...state.traits };

  expect(() => updateTrait(state, "charisma", 0.3)).toThrow(UnknownTraitError);
  expect(state.traits).toEqual(before);
  expect(Object.keys(state.traits)).toEqual([...TRAIT_NAMES]);
});

test("updateFleeting is an absolute, clamped set", () => {
  const state = makeState();

  updateFleeting(state, "anger", 0.4);
  updateFleeting(state, "anger", 0.2);
  expect(state.fleeting.anger).toBe(0.2);

  updateFleeting(state, "confidence", 2);
  expect(state.fleeting.confidence).toBe(1);

  updateFleeting(state, "anxiety", -1);
  expect(state.fleeting.anxiety).toBe(0);
});

test("updateFleeting rejects unknown names", () => {
  const state = makeState();

  expect(() => updateFleeting(state, "rage", 0.5)).toThrow(UnknownFleetingStateError);
  expect(state.fleeting).toEqual({ anger: 0, anxiety: 0, confidence: 0 });
});

test("negative relationship delta hardens cynicism and moral alignment", () => {
  const state = makeState();

  updateRelationship(state, -0.2);

  expect(state.relationshipScore).toBeCloseTo(-0.2, 10);
  expect(state.traits.cynicism).toBeCloseTo(0.32, 10);
  expect(state.traits.moral_alignment).toBeCloseTo(0.51, 10);
});

test("positive relationship delta leaves traits alone", () => {
  const state = makeState();

  updateRelationship(state, 0.2);

  expect(state.relationshipScore).toBeCloseTo(0.2, 10);
  expect(state.traits.cynicism).toBe(0.3);
  expect(state.traits.moral_alignment).toBe(0.5);
});

test("drift uses the requested delta even when the score clamps", () => {
  const state = makeState();

  updateRelationship(state, 3);
  expect(state.relationshipScore).toBe(1);

  updateRelationship(state, -5);
  expect(state.relationshipScore).toBe(-1);
  expect(state.traits.cynicism).toBeCloseTo(0.8, 10);
  expect(state.traits.moral_alignment).toBeCloseTo(0.75, 10);
});

test("updateMoralAlignment clamps at both poles", () => {
  const state = makeState();

  updateMoralAlignment(state, 0.9);
  expect(state.traits.moral_alignment).toBe(1);
  updateMoralAlignment(state, -3);
  expect(state.traits.moral_alignment).toBe(0);
});

test("decayFleeting converges to zero and never goes negative", () => {
  const state = makeState();
  updateFleeting(state, "anger", 0.1);

  for (let i = 0; i < 5; i++) {
    decayFleeting(state, 0.15);
    expect(state.fleeting.anger).toBe(0);
  }
  expect(state.fleeting.anxiety).toBe(0);
});

test("decayFleeting uses 0.1 by default and skips zero entries", () => {
  const state = makeState();
  updateFleeting(state, "confidence", 0.5);

  decayFleeting(state);

  expect(state.fleeting.confidence).toBeCloseTo(0.4, 10);
  expect(state.fleeting.anger).toBe(0);
  expect(state.fleeting.anxiety).toBe(0);
});

test("every value stays in range across a long sequence of updates", () => {
  const state = makeState();
  let seed = 42;
  const next = () => {
    seed = (seed * 1103515245 + 12345) % 2147483648;
    return seed / 2147483648;
  };

  for (let i = 0; i < 500; i++) {
    const delta = (next() - 0.5) * 3;
    const pick = Math.floor(next() * 4);
    if (pick === 0) updateTrait(state, TRAIT_NAMES[i % TRAIT_NAMES.length], delta);
    else if (pick === 1) updateFleeting(state, FLEETING_STATE_NAMES[i % FLEETING_STATE_NAMES.length], delta);
    else if (pick === 2) updateRelationship(state, delta);
    else decayFleeting(state, Math.abs(delta));

    for (const name of TRAIT_NAMES) {
      expect(state.traits[name]).toBeGreaterThanOrEqual(0);
      expect(state.traits[name]).toBeLessThanOrEqual(1);
    }
    for (const name of FLEETING_STATE_NAMES) {
      expect(state.fleeting[name]).toBeGreaterThanOrEqual(0);
      expect(state.fleeting[name]).toBeLessThanOrEqual(1);
    }
    expect(state.relationshipScore).toBeGreaterThanOrEqual(-1);
    expect(state.relationshipScore).toBeLessThanOrEqual(1);
  }
});

test("decayFleeting rejects negative or non-finite rates without touching state", () => {
  const state = makeState();
  updateFleeting(state, "anger", 0.75);

  expect(() => decayFleeting(state, -0.5)).toThrow(InvalidStateValueError);
  expect(() => decayFleeting(state, Number.NaN)).toThrow(InvalidStateValueError);
  expect(() => decayFleeting(state, Number.POSITIVE_INFINITY)).toThrow(InvalidStateValueError);
  expect(state.fleeting.anger).toBe(0.75);

  decayFleeting(state, 0);
  expect(state.fleeting.anger).toBe(0.75);
});

test("non-finite deltas and values are rejected and leave state unchanged", () => {
  const state = makeState();

  expect(() => updateRelationship(state, Number.NaN)).toThrow("Invalid value for relationship: NaN");
  expect(() => updateTrait(state, "fear", Number.NaN)).toThrow(InvalidStateValueError);
  expect(() => updateFleeting(state, "anxiety", Number.POSITIVE_INFINITY)).toThrow(InvalidStateValueError);
  expect(() => updateMoralAlignment(state, Number.NEGATIVE_INFINITY)).toThrow(InvalidStateValueError);

  expect(state.relationshipScore).toBe(0);
  expect(state.traits).toEqual({ loyalty: 0.5, ambition: 0.8, fear: 0.2, cynicism: 0.3, moral_alignment: 0.5 });
  expect(state.fleeting).toEqual({ anger: 0, anxiety: 0, confidence: 0 });
});

test("values stay in range when updates are fed signed and non-finite inputs", () => {
  const state = makeState();
  const inputs = [2.5, -3, 0.4, -0.9, Number.NaN, 1.7, -0.2, Number.POSITIVE_INFINITY, 0.05, -1.5];

  for (const [i, input] of inputs.entries()) {
    const attempts = [
      () => updateTrait(state, TRAIT_NAMES[i % TRAIT_NAMES.length], input),
      () => updateFleeting(state, FLEETING_STATE_NAMES[i % FLEETING_STATE_NAMES.length], input),
      () => updateRelationship(state, input),
      () => decayFleeting(state, input),
    ];
    for (const attempt of attempts) {
      try {
        attempt();
      } catch (err: unknown) {
        expect(err).toBeInstanceOf(InvalidStateValueError);
      }
    }

    for (const name of TRAIT_NAMES) {
      expect(state.traits[name]).toBeGreaterThanOrEqual(0);
      expect(state.traits[name]).toBeLessThanOrEqual(1);
    }
    for (const name of FLEETING_STATE_NAMES) {
      expect(state.fleeting[name]).toBeGreaterThanOrEqual(0);
      expect(state.fleeting[name]).toBeLessThanOrEqual(1);
    }
    expect(state.relationshipScore).toBeGreaterThanOrEqual(-1);
    expect(state.relationshipScore).toBeLessThanOrEqual(1);
  }
});
