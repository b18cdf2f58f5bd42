import { existsSync, readFileSync } from 'node:fs';
import { isPlainObject } from '../patch/path.js';
import type { Template } from './types.js';

export class TemplateError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
    public readonly nodeId?: string,
  ) {
    super(source ? `${message} (${source})` : message);
    this.name = 'TemplateError';
  }
}

/**
 * Validate a graph document and return an independent, deep-frozen copy.
 * Only the graph shape is checked: node classes are backend-specific and are
 * never interpreted.
 */
export function buildTemplate(raw: unknown, source?: string): Template {
  if (!isPlainObject(raw)) {
    throw new TemplateError('Template must be a JSON object of node id to node', source);
  }

  const entries = Object.entries(raw);
  if (entries.length === 0) {
    throw new TemplateError('Template has no nodes', source);
  }

  const template: Template = {};
  for (const [nodeId, node] of entries) {
    if (nodeId === '__proto__') {
      throw new TemplateError(`Node id "${nodeId}" is reserved`, source, nodeId);
    }
    if (!isPlainObject(node)) {
      throw new TemplateError(`Node "${nodeId}" must be an object`, source, nodeId);
    }
    const copy = structuredClone(node);
    const classType = copy.class_type;
    if (typeof classType !== 'string' || classType === '') {
      throw new TemplateError(`Node "${nodeId}" is missing class_type`, source, nodeId);
    }
    const inputs = copy.inputs ?? {};
    if (!isPlainObject(inputs)) {
      throw new TemplateError(`Node "${nodeId}" inputs must be an object`, source, nodeId);
    }
    template[nodeId] = { ...copy, class_type: classType, inputs };
  }

  deepFreeze(template);
  return template;
}

export function parseTemplate(text: string, source?: string): Template {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TemplateError(`Invalid JSON in template: ${reason}`, source);
  }
  return buildTemplate(raw, source);
}

export function loadTemplate(path: string): Template {
  if (!existsSync(path)) {
    throw new TemplateError('Template not found', path);
  }
  return parseTemplate(readFileSync(path, 'utf-8'), path);
}

/** A mutable deep copy; the only way a patch may obtain a writable graph. */
export function cloneTemplate(template: Template): Template {
  return structuredClone(template);
}

function deepFreeze(value: unknown): void {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
}
