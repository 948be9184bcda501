import { FLEETING_STATE_NAMES, TRAIT_NAMES } from "./traits.js";

export class UnknownTraitError extends Error {
  readonly traitName: string;

  constructor(traitName: string) {
    super(`Unknown trait: ${traitName}. Valid: ${TRAIT_NAMES.join(", ")}`);
    this.name = "UnknownTraitError";
    this.traitName = traitName;
  }
}

export class UnknownFleetingStateError extends Error {
  readonly stateName: string;

  constructor(stateName: string) {
    super(`Unknown fleeting state: ${stateName}. Valid: ${FLEETING_STATE_NAMES.join(", ")}`);
    this.name = "UnknownFleetingStateError";
    this.stateName = stateName;
  }
}

/** A delta, value or decay rate that would leave the state out of range. */
export class InvalidStateValueError extends Error {
  readonly field: string;
  readonly value: number;

  constructor(field: string, value: number, expected = "a finite number") {
    super(`Invalid value for ${field}: ${value} (expected ${expected})`);
    this.name = "InvalidStateValueError";
    this.field = field;
    this.value = value;
  }
}
