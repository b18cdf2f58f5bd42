import type { ParamType, ParamValue } from '../manifest/types.js';
import { InvalidChoiceError, ParamRangeError } from './errors.js';

/** The parts of a ParamSpec that restrict an already-coerced value. */
export interface ParamConstraints {
  name: string;
  type: ParamType;
  min?: number;
  max?: number;
  choices?: readonly ParamValue[];
}

/** Bounds are inclusive. Throws ParamRangeError or InvalidChoiceError. */
export function checkConstraints(spec: ParamConstraints, value: ParamValue): void {
  if (typeof value === 'number') {
    const belowMin = spec.min !== undefined && value < spec.min;
    const aboveMax = spec.max !== undefined && value > spec.max;
    if (belowMin || aboveMax) {
      throw new ParamRangeError(spec.name, value, spec.min, spec.max);
    }
  }

  if (spec.choices !== undefined && !spec.choices.includes(value)) {
    throw new InvalidChoiceError(spec.name, value, spec.choices);
  }
}
