import type { Manifest, ParamSpec, ParamValue } from '../manifest/types.js';
import type { Template } from '../template/types.js';
import { cloneTemplate } from '../template/loader.js';
import { checkConstraints } from './constraints.js';
import { InvalidFieldPathError, MissingRequiredParamError, UnknownNodeError, UnknownPresetError } from './errors.js';
import { setAtPath } from './path.js';

export type RawParams = Readonly<Record<string, unknown>>;

export interface PatchResult {
  /** The patched, independent copy of the template. */
  graph: Template;
  /** Coerced value of every declared param that had one, in manifest order. */
  resolved: Record<string, ParamValue>;
}

/**
 * Resolve, coerce and validate `params` against the manifest.
 *
 * Defaults are layered under caller values; `undefined` and `null` count
 * as absent. Keys the manifest does not declare are ignored here.
 */
export function resolveParams(manifest: Manifest, params: RawParams): Map<ParamSpec, ParamValue> {
  const effective = new Map<ParamSpec, unknown>();
  for (const spec of manifest.params.values()) {
    const supplied = Object.hasOwn(params, spec.name) ? params[spec.name] : undefined;
    if (supplied !== undefined && supplied !== null) {
      effective.set(spec, supplied);
    } else if (spec.default !== undefined) {
      effective.set(spec, spec.default);
    } else if (spec.required) {
      throw new MissingRequiredParamError(spec.name);
    }
  }

  const resolved = new Map<ParamSpec, ParamValue>();
  for (const [spec, raw] of effective) {
    const value = spec.coerce(raw);
    checkConstraints(spec, value);
    resolved.set(spec, value);
  }
  return resolved;
}

/**
 * Produce a patched copy of `template`. Pure: the template and manifest are
 * never written, and identical inputs give structurally identical output.
 * Every parameter is validated before the first write, and writes only touch
 * the private copy, so a failure never leaves a partial result behind.
 */
export function patchWorkflow(template: Template, manifest: Manifest, params: RawParams): PatchResult {
  const values = resolveParams(manifest, params);

  const graph = cloneTemplate(template);
  const resolved: Record<string, ParamValue> = {};

  for (const [spec, value] of values) {
    const { nodeId, field, path } = spec.patch;
    const node = Object.hasOwn(graph, nodeId) ? graph[nodeId] : undefined;
    if (node === undefined) {
      throw new UnknownNodeError(spec.name, nodeId);
    }
    setAtPath(node, path, value, (conflictAt) => new InvalidFieldPathError(spec.name, nodeId, field, conflictAt));
    resolved[spec.name] = value;
  }

  return { graph, resolved };
}

export function applyPatch(template: Template, manifest: Manifest, params: RawParams): Template {
  return patchWorkflow(template, manifest, params).graph;
}

/**
 * Layer a named preset under the caller's params. Caller values win.
 * Passing no preset name returns a shallow copy of `params`.
 */
export function applyPreset(
  manifest: Manifest,
  presetName: string | undefined,
  params: RawParams,
): Record<string, unknown> {
  if (presetName === undefined) {
    return { ...params };
  }
  const preset = manifest.presets.get(presetName);
  if (!preset) {
    throw new UnknownPresetError(presetName, manifest.id);
  }
  const merged: Record<string, unknown> = { ...preset };
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) merged[key] = value;
  }
  return merged;
}
