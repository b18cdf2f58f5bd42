import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import type { WorkflowRegistry } from '../workflows/registry.js';
import type { JobService } from '../jobs/service.js';
import { JOB_STATUSES } from '../jobs/store.js';
import type { GenerationBackend } from '../backend/types.js';
import { describeManifest } from '../manifest/describe.js';
import { modelChoices } from '../models/scanner.js';
import type { ModelDirs } from '../models/scanner.js';
import { BadRequestError } from './errors.js';
import { storeUpload } from './uploads.js';

export const DEFAULT_JOB_LIMIT = 50;
export const MAX_JOB_LIMIT = 500;

export interface ApiDeps {
  registry: WorkflowRegistry;
  jobs: JobService;
  backend: GenerationBackend;
  /** Directories scanned for `checkpoint` and `vae` choices. */
  models?: ModelDirs;
  /** The backend's input directory; image uploads are refused without one. */
  uploadDir?: string;
}

const paramsSchema = z.record(z.unknown());

const previewSchema = z.object({
  params: paramsSchema.optional(),
  preset: z.string().min(1).optional(),
});

const jobSchema = previewSchema.extend({
  workflow_id: z.string().min(1),
});

const jobQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_JOB_LIMIT).default(DEFAULT_JOB_LIMIT),
  workflow_id: z.string().min(1).optional(),
  status: z.enum(JOB_STATUSES).optional(),
});

async function readBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new BadRequestError('Request body must be valid JSON');
  }
  return parseInput(schema, raw);
}

function parseInput<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new BadRequestError(issues.join('; '));
  }
  return result.data;
}

export function createApi(deps: ApiDeps): Hono {
  const app = new Hono();

  // Backend reachability; the service itself answers on /health
  app.get('/health', async (c) => {
    try {
      await deps.backend.getSystemStats();
      return c.json({ ok: true, backend_url: deps.backend.baseUrl, error: null });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return c.json({ ok: false, backend_url: deps.backend.baseUrl, error: message });
    }
  });

  app.get('/workflows', (c) => c.json({ ok: true, workflows: deps.registry.listWorkflows() }));

  app.get('/workflows/diagnostics', (c) => {
    const diagnostics = deps.registry.diagnostics();
    return c.json({ ok: true, loaded_at: deps.registry.loadedAt, diagnostics });
  });

  app.post('/workflows/reload', (c) => {
    const result = deps.registry.reload();
    console.log(`[registry] reloaded ${result.count} workflow(s), ${result.failed.length} failed`);
    return c.json({ ok: true, ...result });
  });

  app.get('/workflows/:id', (c) => {
    const { manifest } = deps.registry.getWorkflow(c.req.param('id'));
    const choices = modelChoices(deps.models ?? {}, new Set(manifest.params.keys()));
    return c.json({ ok: true, workflow: describeManifest(manifest, choices) });
  });

  app.post('/workflows/:id/preview', async (c) => {
    const body = await readBody(c, previewSchema);
    const preview = deps.jobs.preview({ workflowId: c.req.param('id'), params: body.params, preset: body.preset });
    return c.json({ ok: true, workflow_id: preview.workflowId, resolved: preview.resolved, graph: preview.graph });
  });

  app.post('/uploads/image', async (c) => {
    if (deps.uploadDir === undefined) {
      return c.json(
        { ok: false, error: { code: 'UPLOADS_DISABLED', message: 'No backend input directory is configured' } },
        503,
      );
    }
    const body = await c.req.parseBody().catch(() => {
      throw new BadRequestError('Request body must be multipart form data');
    });
    const file = body['file'];
    if (file === undefined || typeof file === 'string' || Array.isArray(file)) {
      throw new BadRequestError('file is required');
    }
    const filename = file.name.trim();
    if (filename === '') {
      throw new BadRequestError('filename is required');
    }
    const data = new Uint8Array(await file.arrayBuffer());
    if (data.byteLength === 0) {
      throw new BadRequestError('file is empty');
    }
    const stored = storeUpload(deps.uploadDir, filename, data);
    console.log(`[uploads] stored ${stored} (${data.byteLength} bytes)`);
    return c.json({ ok: true, filename: stored });
  });

  app.post('/jobs', async (c) => {
    const body = await readBody(c, jobSchema);
    const job = await deps.jobs.submit({ workflowId: body.workflow_id, params: body.params, preset: body.preset });
    if (job.status === 'failed') {
      return c.json({ ok: false, error: { code: 'BACKEND_ERROR', message: job.error ?? 'Submission failed' }, job }, 502);
    }
    return c.json({ ok: true, job }, 201);
  });

  app.get('/jobs', (c) => {
    const query = parseInput(jobQuerySchema, c.req.query());
    const jobs = deps.jobs.listJobs({ limit: query.limit, workflowId: query.workflow_id, status: query.status });
    return c.json({ ok: true, jobs });
  });

  app.get('/jobs/:id', (c) => c.json({ ok: true, job: deps.jobs.getJob(c.req.param('id')) }));

  return app;
}
