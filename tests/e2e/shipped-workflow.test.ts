import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CockpitApiError } from 'cockpit-client';
import { setupE2eApp, cleanup } from './helpers.js';
import type { E2eApp } from './helpers.js';

describe('E2E: shipped text-to-image workflow', () => {
  let ctx: E2eApp;

  beforeEach(() => {
    ctx = setupE2eApp({ random: () => 0.25 });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanup(ctx.db, ctx.tmpDir);
  });

  it('loads without diagnostics', async () => {
    expect(await ctx.client.listWorkflows()).toEqual([
      {
        id: 'txt2img_basic',
        name: 'Text to image',
        description: 'Single-pass text-to-image with one checkpoint and a KSampler.',
        version: '1.0.0',
      },
    ]);
    expect(ctx.registry.diagnostics()).toEqual([]);
  });

  it('describes its params to the UI', async () => {
    const workflow = await ctx.client.getWorkflow('txt2img_basic');

    expect(Object.keys(workflow.params)).toEqual([
      'prompt',
      'negative_prompt',
      'seed',
      'steps',
      'cfg',
      'sampler_name',
      'width',
      'height',
    ]);
    expect(workflow.params.prompt?.required).toBe(true);
    expect(workflow.params.sampler_name?.choices).toEqual(['euler', 'euler_ancestral', 'dpmpp_2m', 'dpmpp_2m_sde', 'ddim']);
    expect(workflow.quality_checks).toEqual({ min_width: 512 });
  });

  it('previews a preset with a random seed', async () => {
    const preview = await ctx.client.previewJob('txt2img_basic', { params: { prompt: 'a lighthouse' }, preset: 'draft' });

    // seed -1 maps to floor(0.25 * 2147483648)
    expect(preview.resolved).toEqual({
      prompt: 'a lighthouse',
      negative_prompt: 'blurry, low quality',
      seed: 536870912,
      steps: 12,
      cfg: 7,
      sampler_name: 'euler',
      width: 768,
      height: 768,
    });
    expect(preview.graph['5']?.inputs.seed).toBe(536870912);
    expect(preview.graph['4']?.inputs).toEqual({ width: 768, height: 768, batch_size: 1 });
  });

  it('submits a job and reads it back', async () => {
    const job = await ctx.client.createJob({
      workflow_id: 'txt2img_basic',
      params: { prompt: 'a lighthouse', seed: 7, steps: '30', cfg: '4.5' },
    });

    expect(job.status).toBe('submitted');
    expect(job.resolved_params).toMatchObject({ seed: 7, steps: 30, cfg: 4.5 });

    const sent = ctx.backend.submitted[0]?.graph;
    expect(sent?.['2'].inputs.text).toBe('a lighthouse');
    expect(sent?.['5'].inputs).toMatchObject({ seed: 7, steps: 30, cfg: 4.5, sampler_name: 'euler' });
    expect(ctx.backend.submitted[0]?.clientId).toBe('e2e-client');

    expect(await ctx.client.getJob(job.id)).toEqual(job);
    expect((await ctx.client.listJobs({ workflowId: 'txt2img_basic' })).map((j) => j.id)).toEqual([job.id]);
  });

  it('surfaces validation errors as CockpitApiError', async () => {
    const err = await ctx.client
      .createJob({ workflow_id: 'txt2img_basic', params: { prompt: 'x', sampler_name: 'heun' } })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CockpitApiError);
    if (!(err instanceof CockpitApiError)) return;
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe('INVALID_CHOICE');
    expect(ctx.backend.submitted).toHaveLength(0);
  });

  it('reports a refused submission as a failed job', async () => {
    ctx.backend.failWith = { status: 400, body: 'node 5 is invalid' };

    const err = await ctx.client.createJob({ workflow_id: 'txt2img_basic', params: { prompt: 'x' } }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CockpitApiError);
    if (!(err instanceof CockpitApiError)) return;
    expect(err.statusCode).toBe(502);
    expect(err.code).toBe('BACKEND_ERROR');

    const [job] = await ctx.client.listJobs({ status: 'failed' });
    expect(job?.error).toBe('Generation backend error on /prompt: 400 - node 5 is invalid');
  });

  it('reports backend health', async () => {
    expect(await ctx.client.health()).toEqual({ ok: true, backend_url: 'http://backend.test', error: null });
  });
});
