export const TRAIT_NAMES = ["loyalty", "ambition", "fear", "cynicism", "moral_alignment"] as const;
export const FLEETING_STATE_NAMES = ["anger", "anxiety", "confidence"] as const;

export type TraitName = (typeof TRAIT_NAMES)[number];
export type FleetingStateName = (typeof FLEETING_STATE_NAMES)[number];

export type Traits = Record<TraitName, number>;
export type FleetingState = Record<FleetingStateName, number>;

/** moral_alignment: 0.0 = altruistic, 1.0 = ruthless. */
export const DEFAULT_TRAITS: Readonly<Traits> = Object.freeze({
  loyalty: 0.5,
  ambition: 0.8,
  fear: 0.2,
  cynicism: 0.3,
  moral_alignment: 0.5,
});

export const DEFAULT_FLEETING_STATE: Readonly<FleetingState> = Object.freeze({
  anger: 0,
  anxiety: 0,
  confidence: 0,
});

export function isTraitName(name: string): name is TraitName {
  return TRAIT_NAMES.some((t) => t === name);
}

export function isFleetingStateName(name: string): name is FleetingStateName {
  return FLEETING_STATE_NAMES.some((f) => f === name);
}
