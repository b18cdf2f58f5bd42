export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const PARAM_TYPES = ['string', 'integer', 'number', 'boolean', 'image'] as const;
export type ParamType = (typeof PARAM_TYPES)[number];

export type ParamValue = string | number | boolean;

/** Where a parameter value is written: a node id and a path inside that node. */
export interface PatchTarget {
  nodeId: string;
  /** Dot-separated form as written in the manifest, e.g. `inputs.seed`. */
  field: string;
  /** `field` split once at load time. Never empty, no empty segments. */
  path: readonly string[];
}

export interface ParamSpecBase<T extends ParamType, V extends ParamValue> {
  name: string;
  type: T;
  required: boolean;
  default?: V;
  choices?: readonly V[];
  label?: string;
  description?: string;
  patch: PatchTarget;
  /** Converts a caller-supplied value to this kind; throws TypeCoercionError. */
  coerce: (raw: unknown) => V;
}

export interface NumericBounds {
  min?: number;
  max?: number;
}

export type StringParam = ParamSpecBase<'string', string>;
export type ImageParam = ParamSpecBase<'image', string>;
export type BooleanParam = ParamSpecBase<'boolean', boolean>;
export type IntegerParam = ParamSpecBase<'integer', number> & NumericBounds;
export type NumberParam = ParamSpecBase<'number', number> & NumericBounds;

export type ParamSpec = StringParam | IntegerParam | NumberParam | BooleanParam | ImageParam;

export type PresetValues = Readonly<Record<string, JsonValue>>;

export interface Manifest {
  id: string;
  name: string;
  description: string;
  version: string;
  templateFile: string;
  /** Insertion order follows the manifest document. */
  params: ReadonlyMap<string, ParamSpec>;
  presets: ReadonlyMap<string, PresetValues>;
  qualityChecks?: JsonObject;
  /** Top-level keys this project does not interpret (e.g. `xyz_capable`), kept verbatim. */
  extensions: JsonObject;
}

export function isNumericParam(spec: ParamSpec): spec is IntegerParam | NumberParam {
  return spec.type === 'integer' || spec.type === 'number';
}

export function isParamType(value: unknown): value is ParamType {
  return PARAM_TYPES.some((type) => type === value);
}
