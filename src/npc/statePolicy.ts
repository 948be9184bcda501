/**
 * Clamped update rules for PersonaState.
 *
 * Every operation mutates the state in place and returns the before/after
 * pair it applied. The only cross-field coupling is moral drift in
 * updateRelationship: negative deltas harden cynicism and push
 * moral_alignment toward ruthless; positive deltas never soften them back.
 * Non-finite inputs throw InvalidStateValueError before anything changes.
 */

import { log } from "../utils/logger.js";
import { InvalidStateValueError, UnknownFleetingStateError, UnknownTraitError } from "./errors.js";
import type { PersonaState } from "./personaState.js";
import { FLEETING_STATE_NAMES, isFleetingStateName, isTraitName } from "./traits.js";

const stateLog = log.withScope("npc-state");

export const DEFAULT_DECAY_RATE = 0.1;
export const CYNICISM_DRIFT_FACTOR = 0.1;
export const MORAL_DRIFT_FACTOR = 0.05;

export type ValueChange = {
  before: number;
  after: number;
};

export function clamp(lower: number, upper: number, value: number): number {
  return Math.max(lower, Math.min(upper, value));
}

function requireFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidStateValueError(field, value);
  }
}

export function updateTrait(state: PersonaState, name: string, delta: number): ValueChange {
  if (!isTraitName(name)) {
    throw new UnknownTraitError(name);
  }
  requireFinite(name, delta);
  const before = state.traits[name];
  const after = clamp(0, 1, before + delta);
  state.traits[name] = after;
  stateLog.debug(`${state.name}'s ${name} changed: ${before.toFixed(2)} -> ${after.toFixed(2)}`);
  return { before, after };
}

/** Absolute set, not a delta. */
export function updateFleeting(state: PersonaState, name: string, value: number): ValueChange {
  if (!isFleetingStateName(name)) {
    throw new UnknownFleetingStateError(name);
  }
  requireFinite(name, value);
  const before = state.fleeting[name];
  const after = clamp(0, 1, value);
  state.fleeting[name] = after;
  stateLog.debug(`Fleeting state '${name}' set to ${after.toFixed(2)}`);
  return { before, after };
}

/** Throws InvalidStateValueError for a negative or non-finite rate. */
export function decayFleeting(state: PersonaState, rate: number = DEFAULT_DECAY_RATE): void {
  if (!Number.isFinite(rate) || rate < 0) {
    throw new InvalidStateValueError("decay rate", rate, "a finite number >= 0");
  }
  for (const name of FLEETING_STATE_NAMES) {
    const current = state.fleeting[name];
    if (current > 0) {
      state.fleeting[name] = clamp(0, 1, current - rate);
    }
  }
}

export function updateMoralAlignment(state: PersonaState, delta: number): ValueChange {
  requireFinite("moral_alignment", delta);
  const before = state.traits.moral_alignment;
  const after = clamp(0, 1, before + delta);
  state.traits.moral_alignment = after;
  stateLog.debug(
    `Moral alignment shifted: ${before.toFixed(2)} -> ${after.toFixed(2)} (change: ${delta >= 0 ? "+" : ""}${delta.toFixed(2)})`
  );
  return { before, after };
}

export function updateRelationship(state: PersonaState, delta: number): ValueChange {
  requireFinite("relationship", delta);
  const before = state.relationshipScore;
  const after = clamp(-1, 1, before + delta);
  state.relationshipScore = after;

  if (delta < 0) {
    const magnitude = Math.abs(delta);
    updateTrait(state, "cynicism", magnitude * CYNICISM_DRIFT_FACTOR);
    updateMoralAlignment(state, magnitude * MORAL_DRIFT_FACTOR);
  }

  stateLog.debug(
    `Player relationship adapted: ${before.toFixed(2)} -> ${after.toFixed(2)} (change: ${delta >= 0 ? "+" : ""}${delta.toFixed(2)})`
  );
  return { before, after };
}
