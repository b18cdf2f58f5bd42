import { join } from 'node:path';
import { mkdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import type { Template } from './template/types.js';
import { BackendError } from './backend/types.js';
import type { GenerationBackend, SubmitResult } from './backend/types.js';

export function makeTmpDir(): string {
  const dir = join(tmpdir(), `cockpit-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

/** Write `<root>/<id>/manifest.json` and its template. */
export function writeWorkflow(root: string, id: string, manifest: Record<string, unknown>, template: unknown): void {
  const dir = join(root, id);
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, 'manifest.json'), JSON.stringify({ id, template_file: 'template_api.json', ...manifest }));
  writeFileSync(join(dir, 'template_api.json'), JSON.stringify(template));
}

/** A small text-to-image workflow used across job and API tests. */
export function writeSampleWorkflow(root: string): void {
  writeWorkflow(
    root,
    'sample',
    {
      name: 'Sample',
      description: 'Sampler fed by a text prompt',
      version: '1.0.0',
      params: {
        prompt: { type: 'string', required: true, patch: { node_id: '2', field: 'inputs.text' } },
        seed: { type: 'integer', default: 5, min: -1, max: 1000, patch: { node_id: '3', field: 'inputs.seed' } },
        steps: { type: 'integer', default: 20, min: 1, max: 150, patch: { node_id: '3', field: 'inputs.steps' } },
      },
      presets: { draft: { steps: 8 } },
    },
    {
      '1': { class_type: 'CheckpointLoaderSimple', inputs: { ckpt_name: 'model.safetensors' } },
      '2': { class_type: 'CLIPTextEncode', inputs: { text: '', clip: ['1', 1] } },
      '3': { class_type: 'KSampler', inputs: { seed: 0, steps: 20, model: ['1', 0], positive: ['2', 0] } },
    },
  );
}

/** In-process stand-in for the generation backend. */
export class FakeBackend implements GenerationBackend {
  readonly baseUrl = 'http://backend.test';
  readonly submitted: Array<{ graph: Template; clientId: string }> = [];
  /** When set, submissions fail with this status and body. */
  failWith: { status: number; body: string } | null = null;
  reachable = true;

  async submitPrompt(graph: Template, clientId: string): Promise<SubmitResult> {
    if (this.failWith) {
      throw new BackendError('/prompt', this.failWith.status, this.failWith.body);
    }
    this.submitted.push({ graph, clientId });
    return { prompt_id: `prompt-${this.submitted.length}`, number: this.submitted.length };
  }

  async getSystemStats(): Promise<Record<string, unknown>> {
    if (!this.reachable) {
      throw new BackendError('/system_stats', null, 'connect ECONNREFUSED');
    }
    return { system: { os: 'test' } };
  }
}
