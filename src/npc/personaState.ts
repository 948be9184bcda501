/**
 * Psychological state of one NPC. Identity is fixed at creation; traits,
 * fleeting emotions and the relationship score are mutated in place by
 * statePolicy.ts for the lifetime of the NPC.
 */

import {
  DEFAULT_FLEETING_STATE,
  DEFAULT_TRAITS,
  FLEETING_STATE_NAMES,
  type FleetingState,
  type Traits,
} from "./traits.js";

export type PersonaIdentity = {
  readonly name: string;
  readonly faction: string;
  readonly coreGoal: string;
  readonly moralCode: string;
};

export type PersonaState = PersonaIdentity & {
  traits: Traits;
  fleeting: FleetingState;
  /** -1.0 = total enmity, 1.0 = full alliance, 0.0 = neutral/unknown. */
  relationshipScore: number;
};

/** Fleeting emotions at or below this level are left out of the rendered context. */
export const FLEETING_RENDER_THRESHOLD = 0.1;

export function createPersonaState(identity: PersonaIdentity): PersonaState {
  return {
    name: identity.name,
    faction: identity.faction,
    coreGoal: identity.coreGoal,
    moralCode: identity.moralCode,
    traits: { ...DEFAULT_TRAITS },
    fleeting: { ...DEFAULT_FLEETING_STATE },
    relationshipScore: 0,
  };
}

export function snapshotPersonaState(state: PersonaState): Readonly<PersonaState> {
  return Object.freeze({
    ...state,
    traits: Object.freeze({ ...state.traits }),
    fleeting: Object.freeze({ ...state.fleeting }),
  });
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function fixed(value: number): string {
  return value.toFixed(2);
}

export function renderTraitSummary(traits: Traits): string {
  return [
    `Loyalty: ${fixed(traits.loyalty)}`,
    `Ambition: ${fixed(traits.ambition)}`,
    `Fear: ${fixed(traits.fear)}`,
    `Cynicism: ${fixed(traits.cynicism)}`,
    `Moral Alignment (0.0=Good, 1.0=Evil): ${fixed(traits.moral_alignment)}`,
  ].join(", ");
}

export function renderFleetingNote(fleeting: FleetingState): string {
  const active = FLEETING_STATE_NAMES
    .filter((name) => fleeting[name] > FLEETING_RENDER_THRESHOLD)
    .map((name) => `${capitalize(name)}: ${fixed(fleeting[name])}`);

  if (active.length === 0) {
    return "You are currently calm.";
  }
  return `Your current fleeting emotional state is: ${active.join(", ")}.`;
}

/**
 * Deterministic persona description handed to the response backend,
 * ending with the three-part output contract the parser expects.
 */
export function renderPersonaContext(state: PersonaState): string {
  const { traits } = state;

  return `You are an advanced NPC named '${state.name}' of ${state.faction}.
Your supreme, overriding goal is: "${state.coreGoal}".
Your moral code is: "${state.moralCode}".
Your current psychological profile is: ${renderTraitSummary(traits)}.
${renderFleetingNote(state.fleeting)}
Your current relationship score with the Player is: ${fixed(state.relationshipScore)}.

PRIORITY INSTRUCTIONS: Think and plan an action before you respond.
Always answer in this three-part format, with each marker on its own line:

1. [ANALYSIS] (Internal monologue. Never shown to the Player.)
   - GOAL CHECK: How does this interaction advance my core goal?
   - MORAL/FEAR CHECK: Does my ${fixed(traits.moral_alignment)} moral alignment justify the action? Is my ${fixed(traits.fear)} fear overcome by my ${fixed(traits.ambition)} ambition?
   - PLAYER PREDICTION: What is the Player's likely hidden agenda or next move, given my memory?
   - STRATEGY: What is my adaptive counter-move?

2. [ACTION] (One structured command for the game engine. Format: ACTION_TYPE: TARGET; PARAMETER: VALUE)
   - Examples: BETRAY: Player; REASON: Self_Preservation, or REPORT: Faction_Guardians; TARGET: Player_Location, or NO_ACTION: None; REASON: Observing

3. [DIALOGUE] (The words spoken to the Player. Let the fleeting emotional state color tone, vocabulary and pacing.)

Stay in character at all times.`;
}
