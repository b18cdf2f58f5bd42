import type { ParamType, ParamValue } from '../manifest/types.js';

export type PatchErrorCode =
  | 'missing_required_param'
  | 'type_coercion'
  | 'param_range'
  | 'invalid_choice'
  | 'unknown_node'
  | 'invalid_field_path'
  | 'unknown_preset';

/**
 * Base class of every failure raised while turning caller parameters into a
 * patched graph. None of these are transient; they point at the request or
 * the manifest.
 */
export abstract class PatchError extends Error {
  abstract readonly code: PatchErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /** Structured context rendered next to `code` and `message`. */
  abstract get details(): Record<string, unknown>;

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message, ...this.details };
  }
}

export class MissingRequiredParamError extends PatchError {
  readonly code = 'missing_required_param';

  constructor(public readonly param: string) {
    super(`Missing required parameter: ${param}`);
  }

  get details() {
    return { param: this.param };
  }
}

export class TypeCoercionError extends PatchError {
  readonly code = 'type_coercion';

  constructor(
    public readonly param: string,
    public readonly expected: ParamType,
    public readonly got: string,
  ) {
    super(`Parameter '${param}' expected ${expected}, got ${got}`);
  }

  get details() {
    return { param: this.param, expected: this.expected, got: this.got };
  }
}

export class ParamRangeError extends PatchError {
  readonly code = 'param_range';

  constructor(
    public readonly param: string,
    public readonly value: number,
    public readonly min: number | undefined,
    public readonly max: number | undefined,
  ) {
    super(`Parameter '${param}' value ${value} is outside [${min ?? '-inf'}, ${max ?? 'inf'}]`);
  }

  get details() {
    return { param: this.param, value: this.value, min: this.min ?? null, max: this.max ?? null };
  }
}

export class InvalidChoiceError extends PatchError {
  readonly code = 'invalid_choice';

  constructor(
    public readonly param: string,
    public readonly value: ParamValue,
    public readonly choices: readonly ParamValue[],
  ) {
    super(`Parameter '${param}' value ${JSON.stringify(value)} is not one of: ${choices.map((c) => JSON.stringify(c)).join(', ')}`);
  }

  get details() {
    return { param: this.param, value: this.value, choices: [...this.choices] };
  }
}

export class UnknownNodeError extends PatchError {
  readonly code = 'unknown_node';

  constructor(
    public readonly param: string,
    public readonly nodeId: string,
  ) {
    super(`Cannot patch parameter '${param}': node '${nodeId}' not found in template`);
  }

  get details() {
    return { param: this.param, node_id: this.nodeId };
  }
}

export class InvalidFieldPathError extends PatchError {
  readonly code = 'invalid_field_path';

  constructor(
    public readonly param: string,
    public readonly nodeId: string,
    public readonly field: string,
    /** The prefix of `field` that exists but is not an object. */
    public readonly conflictAt: string,
  ) {
    super(`Cannot patch parameter '${param}': '${conflictAt}' in node '${nodeId}' is not an object (field '${field}')`);
  }

  get details() {
    return { param: this.param, node_id: this.nodeId, field: this.field, conflict_at: this.conflictAt };
  }
}

export class UnknownPresetError extends PatchError {
  readonly code = 'unknown_preset';

  constructor(
    public readonly preset: string,
    public readonly workflowId: string,
  ) {
    super(`Workflow '${workflowId}' has no preset named '${preset}'`);
  }

  get details() {
    return { preset: this.preset, workflow_id: this.workflowId };
  }
}

/** Short rendering of a rejected value for error messages. */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value.length > 80 ? `${value.slice(0, 77)}...` : value);
    case 'number':
    case 'boolean':
      return String(value);
    default:
      return typeof value;
  }
}
