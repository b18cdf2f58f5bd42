import type { ParamType, ParamValue } from '../manifest/types.js';
import { TypeCoercionError, describeValue } from './errors.js';

type Coercer<V extends ParamValue> = (param: string, raw: unknown) => V;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGRAL = /^[+-]?\d+(\.0*)?$/;

// Plain decimal notation only: no hex, binary or octal prefixes.
function parseNumeric(raw: string, pattern: RegExp): number | undefined {
  const trimmed = raw.trim();
  if (!pattern.test(trimmed)) return undefined;
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : undefined;
}

const toInteger: Coercer<number> = (param, raw) => {
  const num = typeof raw === 'number' ? raw : typeof raw === 'string' ? parseNumeric(raw, INTEGRAL) : undefined;
  if (num === undefined || !Number.isInteger(num)) {
    throw new TypeCoercionError(param, 'integer', describeValue(raw));
  }
  return num;
};

const toNumber: Coercer<number> = (param, raw) => {
  const num = typeof raw === 'number' ? raw : typeof raw === 'string' ? parseNumeric(raw, DECIMAL) : undefined;
  if (num === undefined || !Number.isFinite(num)) {
    throw new TypeCoercionError(param, 'number', describeValue(raw));
  }
  return num;
};

const toBoolean: Coercer<boolean> = (param, raw) => {
  if (typeof raw === 'boolean') return raw;
  if (typeof raw === 'string') {
    const lowered = raw.trim().toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
  }
  throw new TypeCoercionError(param, 'boolean', describeValue(raw));
};

function textCoercer(kind: 'string' | 'image'): Coercer<string> {
  return (param, raw) => {
    if (typeof raw === 'string') return raw;
    // Scalars only; structured values are never stringified.
    if (typeof raw === 'number' || typeof raw === 'boolean') return String(raw);
    throw new TypeCoercionError(param, kind, describeValue(raw));
  };
}

export interface CoercerTable {
  string: Coercer<string>;
  image: Coercer<string>;
  integer: Coercer<number>;
  number: Coercer<number>;
  boolean: Coercer<boolean>;
}

export const coercers: CoercerTable = {
  string: textCoercer('string'),
  image: textCoercer('image'),
  integer: toInteger,
  number: toNumber,
  boolean: toBoolean,
} satisfies Record<ParamType, Coercer<ParamValue>>;
