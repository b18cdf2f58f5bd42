import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { buildTemplate, cloneTemplate, loadTemplate, parseTemplate, TemplateError } from './loader.js';
import { makeTmpDir } from '../test-utils.js';

describe('buildTemplate', () => {
  it('returns a deep-frozen copy', () => {
    const raw = { '1': { class_type: 'KSampler', inputs: { seed: 1, model: ['4', 0] } } };
    const template = buildTemplate(raw);

    expect(template).toEqual(raw);
    expect(Object.isFrozen(template)).toBe(true);
    expect(Object.isFrozen(template['1'].inputs)).toBe(true);
    expect(Object.isFrozen(template['1'].inputs.model)).toBe(true);

    raw['1'].inputs.seed = 2;
    expect(template['1'].inputs.seed).toBe(1);
  });

  it('fills in missing inputs', () => {
    expect(buildTemplate({ '9': { class_type: 'Note' } })).toEqual({ '9': { class_type: 'Note', inputs: {} } });
  });

  it('keeps extra node keys such as _meta', () => {
    const template = buildTemplate({ '1': { class_type: 'A', inputs: {}, _meta: { title: 'Loader' } } });
    expect(template['1']._meta).toEqual({ title: 'Loader' });
  });

  it('rejects malformed graphs', () => {
    expect(() => buildTemplate([])).toThrow('Template must be a JSON object of node id to node');
    expect(() => buildTemplate({})).toThrow('Template has no nodes');
    expect(() => buildTemplate({ '1': 'node' })).toThrow('Node "1" must be an object');
    expect(() => buildTemplate({ '1': { inputs: {} } })).toThrow('Node "1" is missing class_type');
    expect(() => buildTemplate({ '1': { class_type: 'A', inputs: [] } })).toThrow('Node "1" inputs must be an object');
  });

  it('rejects a reserved node id', () => {
    const raw: unknown = JSON.parse('{"__proto__": {"class_type": "A"}, "2": {"class_type": "B"}}');
    expect(() => buildTemplate(raw)).toThrow(TemplateError);
    expect(() => buildTemplate(raw)).toThrow('Node id "__proto__" is reserved');
  });

  it('records the offending node', () => {
    try {
      buildTemplate({ '1': { class_type: 'A' }, '2': { class_type: '' } }, 'wf/template_api.json');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TemplateError);
      if (!(err instanceof TemplateError)) return;
      expect(err.nodeId).toBe('2');
      expect(err.message).toBe('Node "2" is missing class_type (wf/template_api.json)');
    }
  });
});

describe('cloneTemplate', () => {
  it('returns an independent writable copy', () => {
    const template = buildTemplate({ '1': { class_type: 'A', inputs: { text: 'a' } } });
    const copy = cloneTemplate(template);
    copy['1'].inputs.text = 'b';
    expect(template['1'].inputs.text).toBe('a');
    expect(Object.isFrozen(copy['1'])).toBe(false);
  });
});

describe('template files', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir();
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('loads a template from disk', () => {
    const path = join(tmpDir, 'template_api.json');
    writeFileSync(path, JSON.stringify({ '1': { class_type: 'A', inputs: {} } }));
    expect(loadTemplate(path)).toEqual({ '1': { class_type: 'A', inputs: {} } });
  });

  it('reports a missing file with its path', () => {
    const path = join(tmpDir, 'nope.json');
    expect(() => loadTemplate(path)).toThrow(`Template not found (${path})`);
  });

  it('reports invalid JSON', () => {
    expect(() => parseTemplate('{')).toThrow(/^Invalid JSON in template: /);
  });
});
