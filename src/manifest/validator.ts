import type {
  JsonObject,
  JsonValue,
  Manifest,
  NumericBounds,
  ParamSpec,
  ParamValue,
  PatchTarget,
  PresetValues,
} from './types.js';
import { PARAM_TYPES, isParamType } from './types.js';
import { ManifestError } from './errors.js';
import { coercers } from '../patch/coerce.js';
import { checkConstraints } from '../patch/constraints.js';
import type { ParamConstraints } from '../patch/constraints.js';
import { PatchError } from '../patch/errors.js';
import { isPlainObject } from '../patch/path.js';

const REQUIRED_FIELDS = ['id', 'name', 'template_file', 'params'] as const;

const KNOWN_FIELDS = new Set<string>([
  ...REQUIRED_FIELDS,
  'description',
  'version',
  'presets',
  'quality_checks',
]);

// Segments that would reach Object.prototype when walked.
const FORBIDDEN_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

interface DefaultSlots extends ParamConstraints {
  default?: ParamValue;
  coerce: (raw: unknown) => ParamValue;
}

/**
 * Validate a manifest document and return every problem found.
 * An empty array means `buildManifest` will succeed.
 */
export function collectManifestIssues(raw: unknown): string[] {
  return analyzeManifest(raw).issues;
}

/**
 * Turn a parsed manifest document into a Manifest.
 * Throws ManifestError listing every issue when the document is invalid.
 */
export function buildManifest(raw: unknown, source?: string): Manifest {
  const { manifest, issues } = analyzeManifest(raw);
  if (!manifest || issues.length > 0) {
    throw new ManifestError(issues, source);
  }
  return manifest;
}

function analyzeManifest(raw: unknown): { manifest?: Manifest; issues: string[] } {
  const issues: string[] = [];

  if (!isPlainObject(raw)) {
    return { issues: ['Manifest must be a JSON object'] };
  }

  for (const field of REQUIRED_FIELDS) {
    if (!(field in raw)) {
      issues.push(`Manifest missing required field: ${field}`);
    }
  }

  const id = optionalString(raw, 'id', issues);
  if (id === '') issues.push('Manifest field "id" must not be empty');
  const name = optionalString(raw, 'name', issues);
  const description = optionalString(raw, 'description', issues) ?? '';
  const version = optionalString(raw, 'version', issues) ?? '';
  const templateFile = parseTemplateFile(raw.template_file, issues);

  const params = new Map<string, ParamSpec>();
  if (raw.params !== undefined) {
    if (!isPlainObject(raw.params)) {
      issues.push('Manifest "params" must be an object');
    } else {
      for (const [paramName, def] of Object.entries(raw.params)) {
        const spec = buildParam(paramName, def, issues);
        if (spec) params.set(paramName, spec);
      }
      checkDuplicateTargets(params, issues);
    }
  }

  const presets = parsePresets(raw.presets, issues);

  let qualityChecks: JsonObject | undefined;
  if (raw.quality_checks !== undefined && raw.quality_checks !== null) {
    if (isPlainObject(raw.quality_checks)) {
      qualityChecks = raw.quality_checks;
    } else {
      issues.push('Manifest "quality_checks" must be an object');
    }
  }

  const extensions: JsonObject = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_FIELDS.has(key)) extensions[key] = value;
  }

  if (issues.length > 0 || id === undefined || name === undefined || templateFile === undefined) {
    return { issues };
  }

  return {
    manifest: { id, name, description, version, templateFile, params, presets, qualityChecks, extensions },
    issues,
  };
}

function optionalString(obj: JsonObject, key: string, issues: string[]): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    issues.push(`Manifest field "${key}" must be a string`);
    return undefined;
  }
  return value;
}

function parseTemplateFile(value: JsonValue | undefined, issues: string[]): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    issues.push('Manifest field "template_file" must be a non-empty string');
    return undefined;
  }
  const segments = value.split(/[\\/]/);
  if (value.startsWith('/') || value.startsWith('\\') || /^[A-Za-z]:/.test(value) || segments.includes('..')) {
    issues.push(`Manifest field "template_file" must be a path inside the workflow directory: "${value}"`);
    return undefined;
  }
  return value;
}

function parsePatchTarget(paramName: string, patch: JsonValue | undefined, issues: string[]): PatchTarget | undefined {
  if (patch === undefined) {
    issues.push(`Parameter "${paramName}" missing required field: patch`);
    return undefined;
  }
  if (!isPlainObject(patch)) {
    issues.push(`Parameter "${paramName}" patch must be an object`);
    return undefined;
  }

  let nodeId: string | undefined;
  if (patch.node_id === undefined) {
    issues.push(`Parameter "${paramName}" patch missing required field: node_id`);
  } else if (typeof patch.node_id === 'string' && patch.node_id !== '') {
    nodeId = patch.node_id;
  } else if (typeof patch.node_id === 'number' && Number.isInteger(patch.node_id)) {
    nodeId = String(patch.node_id);
  } else {
    issues.push(`Parameter "${paramName}" patch node_id must be a non-empty string`);
  }

  let field: string | undefined;
  let path: string[] | undefined;
  if (patch.field === undefined) {
    issues.push(`Parameter "${paramName}" patch missing required field: field`);
  } else if (typeof patch.field !== 'string') {
    issues.push(`Parameter "${paramName}" patch field must be a string`);
  } else {
    const segments = patch.field.split('.');
    if (segments.some((s) => s === '')) {
      issues.push(`Parameter "${paramName}" patch field "${patch.field}" has an empty path segment`);
    } else if (segments.some((s) => FORBIDDEN_SEGMENTS.has(s))) {
      issues.push(`Parameter "${paramName}" patch field "${patch.field}" uses a reserved segment`);
    } else {
      field = patch.field;
      path = segments;
    }
  }

  if (nodeId === undefined || field === undefined || path === undefined) return undefined;
  return { nodeId, field, path };
}

function parseBounds(paramName: string, def: JsonObject, numeric: boolean, issues: string[]): NumericBounds {
  const bounds: NumericBounds = {};
  for (const key of ['min', 'max'] as const) {
    const value = def[key];
    if (value === undefined || value === null) continue;
    if (!numeric) {
      issues.push(`Parameter "${paramName}" sets "${key}" but its type is not numeric`);
    } else if (typeof value !== 'number' || !Number.isFinite(value)) {
      issues.push(`Parameter "${paramName}" "${key}" must be a number`);
    } else {
      bounds[key] = value;
    }
  }
  if (bounds.min !== undefined && bounds.max !== undefined && bounds.min > bounds.max) {
    issues.push(`Parameter "${paramName}" has min ${bounds.min} greater than max ${bounds.max}`);
  }
  return bounds;
}

function buildParam(paramName: string, def: JsonValue, issues: string[]): ParamSpec | undefined {
  if (paramName === '__proto__') {
    issues.push(`Parameter name "${paramName}" is reserved`);
    return undefined;
  }
  if (!isPlainObject(def)) {
    issues.push(`Parameter "${paramName}" must be an object`);
    return undefined;
  }

  const before = issues.length;
  const type = def.type;
  if (type === undefined) {
    issues.push(`Parameter "${paramName}" missing required field: type`);
  } else if (!isParamType(type)) {
    issues.push(`Parameter "${paramName}" has invalid type ${JSON.stringify(type)}. Valid types: ${PARAM_TYPES.join(', ')}`);
  }

  const patch = parsePatchTarget(paramName, def.patch, issues);

  if (def.required !== undefined && typeof def.required !== 'boolean') {
    issues.push(`Parameter "${paramName}" "required" must be a boolean`);
  }
  for (const key of ['label', 'description'] as const) {
    if (def[key] !== undefined && typeof def[key] !== 'string') {
      issues.push(`Parameter "${paramName}" "${key}" must be a string`);
    }
  }

  const bounds = parseBounds(paramName, def, type === 'integer' || type === 'number', issues);

  if (!isParamType(type) || patch === undefined || issues.length > before) {
    return undefined;
  }

  const common = {
    name: paramName,
    required: def.required === true,
    label: typeof def.label === 'string' ? def.label : undefined,
    description: typeof def.description === 'string' ? def.description : undefined,
    patch,
  };

  switch (type) {
    case 'string':
      return withDefaults({ ...common, type, coerce: (raw: unknown) => coercers.string(paramName, raw) }, def, issues);
    case 'image':
      return withDefaults({ ...common, type, coerce: (raw: unknown) => coercers.image(paramName, raw) }, def, issues);
    case 'boolean':
      return withDefaults({ ...common, type, coerce: (raw: unknown) => coercers.boolean(paramName, raw) }, def, issues);
    case 'integer':
      return withDefaults({ ...common, ...bounds, type, coerce: (raw: unknown) => coercers.integer(paramName, raw) }, def, issues);
    case 'number':
      return withDefaults({ ...common, ...bounds, type, coerce: (raw: unknown) => coercers.number(paramName, raw) }, def, issues);
  }
}

/**
 * Coerce `choices` and `default` through the spec's own coercer and check
 * them against its constraints, so a manifest cannot ship a default the
 * patch engine would reject.
 */
function withDefaults<S extends DefaultSlots>(
  spec: S,
  def: JsonObject,
  issues: string[],
): S | undefined {
  const before = issues.length;
  const fail = (what: string, err: unknown): void => {
    if (!(err instanceof PatchError)) throw err;
    issues.push(`Parameter "${spec.name}" ${what}: ${err.message}`);
  };

  if (def.choices !== undefined && def.choices !== null) {
    if (!Array.isArray(def.choices) || def.choices.length === 0) {
      issues.push(`Parameter "${spec.name}" "choices" must be a non-empty array`);
    } else {
      const choices: ParamValue[] = [];
      for (const choice of def.choices) {
        try {
          const value = spec.coerce(choice);
          checkConstraints({ ...spec, choices: undefined }, value);
          choices.push(value);
        } catch (err) {
          fail('choice', err);
        }
      }
      spec.choices = choices;
    }
  }

  if (def.default !== undefined && def.default !== null) {
    try {
      const value = spec.coerce(def.default);
      checkConstraints(spec, value);
      spec.default = value;
    } catch (err) {
      fail('default', err);
    }
  }

  return issues.length > before ? undefined : spec;
}

function checkDuplicateTargets(params: ReadonlyMap<string, ParamSpec>, issues: string[]): void {
  const owners = new Map<string, string>();
  for (const spec of params.values()) {
    const key = `${spec.patch.nodeId}\u0000${spec.patch.field}`;
    const owner = owners.get(key);
    if (owner !== undefined) {
      issues.push(
        `Parameters "${owner}" and "${spec.name}" both patch node "${spec.patch.nodeId}" field "${spec.patch.field}"`,
      );
    } else {
      owners.set(key, spec.name);
    }
  }
}

function parsePresets(value: JsonValue | undefined, issues: string[]): Map<string, PresetValues> {
  const presets = new Map<string, PresetValues>();
  if (value === undefined || value === null) return presets;
  if (!isPlainObject(value)) {
    issues.push('Manifest "presets" must be an object');
    return presets;
  }
  for (const [presetName, values] of Object.entries(value)) {
    if (!isPlainObject(values)) {
      issues.push(`Preset "${presetName}" must be an object of parameter values`);
      continue;
    }
    presets.set(presetName, values);
  }
  return presets;
}
