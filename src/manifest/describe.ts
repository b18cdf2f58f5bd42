import type { JsonObject, JsonValue, Manifest, ParamSpec } from './types.js';
import { isNumericParam } from './types.js';

/** Plain-JSON form of a ParamSpec, as served to the UI. */
export function describeParam(spec: ParamSpec): JsonObject {
  const out: JsonObject = {
    type: spec.type,
    required: spec.required,
    patch: { node_id: spec.patch.nodeId, field: spec.patch.field },
  };
  if (spec.default !== undefined) out.default = spec.default;
  if (spec.choices !== undefined) out.choices = [...spec.choices];
  if (isNumericParam(spec)) {
    if (spec.min !== undefined) out.min = spec.min;
    if (spec.max !== undefined) out.max = spec.max;
  }
  if (spec.label !== undefined) out.label = spec.label;
  if (spec.description !== undefined) out.description = spec.description;
  // Image params carry a filename that must be uploaded to the backend first.
  if (spec.type === 'image') out.upload = true;
  return out;
}

/** `choices` replaces the listed params' choices, e.g. with scanned model files. */
export function describeManifest(manifest: Manifest, choices?: ReadonlyMap<string, readonly string[]>): JsonObject {
  const params: JsonObject = {};
  for (const [name, spec] of manifest.params) {
    const described = describeParam(spec);
    const injected = choices?.get(name);
    if (injected !== undefined) described.choices = [...injected];
    params[name] = described;
  }

  const presets: JsonObject = {};
  for (const [name, values] of manifest.presets) {
    presets[name] = { ...values };
  }

  const out: { [key: string]: JsonValue } = {
    id: manifest.id,
    name: manifest.name,
    description: manifest.description,
    version: manifest.version,
    params,
    presets,
  };
  if (manifest.qualityChecks !== undefined) out.quality_checks = manifest.qualityChecks;
  return out;
}
