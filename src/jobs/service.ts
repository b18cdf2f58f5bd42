import { randomUUID } from 'node:crypto';
import type { Manifest, ParamValue } from '../manifest/types.js';
import type { Template } from '../template/types.js';
import { applyPreset, patchWorkflow } from '../patch/engine.js';
import type { RawParams } from '../patch/engine.js';
import type { WorkflowRegistry } from '../workflows/registry.js';
import type { GenerationBackend } from '../backend/types.js';
import { JobNotFoundError } from './store.js';
import type { JobFilters, JobRecord, JobStore } from './store.js';

/**
 * What happens to caller params the manifest does not declare when the job
 * is stored. The patch engine ignores them either way.
 * - `retain`: stored verbatim next to the declared params
 * - `drop`: only declared params are stored
 */
export type UnknownParamPolicy = 'retain' | 'drop';

/** Largest seed handed out for the `-1` sentinel. */
export const MAX_SEED = 2 ** 31 - 1;

export interface JobRequest {
  workflowId: string;
  params?: RawParams;
  preset?: string;
}

export interface JobPreview {
  workflowId: string;
  graph: Template;
  resolved: Record<string, ParamValue>;
}

export interface JobServiceDeps {
  registry: WorkflowRegistry;
  store: JobStore;
  backend: GenerationBackend;
  clientId: string;
  unknownParams: UnknownParamPolicy;
  /** Integer params for which `-1` means "pick a random seed". */
  seedParams: readonly string[];
  /** Returns a float in [0, 1). Defaults to Math.random. */
  random?: () => number;
}

export class JobService {
  private random: () => number;

  constructor(private deps: JobServiceDeps) {
    this.random = deps.random ?? Math.random;
  }

  /** Patch without storing or submitting anything. */
  preview(request: JobRequest): JobPreview {
    const { graph, resolved } = this.prepare(request).result;
    return { workflowId: request.workflowId, graph, resolved };
  }

  /**
   * Patch the workflow, record the job and submit the graph to the backend.
   * Patch failures throw before anything is stored. A backend failure is
   * recorded on the job, which is returned with status `failed`.
   */
  async submit(request: JobRequest): Promise<JobRecord> {
    const { manifest, params, result } = this.prepare(request);

    const job = this.deps.store.create({
      id: randomUUID(),
      workflowId: manifest.id,
      params: this.storedParams(manifest, params),
      resolvedParams: result.resolved,
    });

    try {
      const submitted = await this.deps.backend.submitPrompt(result.graph, this.deps.clientId);
      console.log(`[jobs] ${job.id} submitted to ${this.deps.backend.baseUrl} as ${submitted.prompt_id}`);
      return this.deps.store.markSubmitted(job.id, submitted.prompt_id);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[jobs] ${job.id} submission failed: ${message}`);
      return this.deps.store.markFailed(job.id, message);
    }
  }

  getJob(jobId: string): JobRecord {
    const job = this.deps.store.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  listJobs(filters?: JobFilters): JobRecord[] {
    return this.deps.store.list(filters);
  }

  private prepare(request: JobRequest) {
    const { manifest, template } = this.deps.registry.getWorkflow(request.workflowId);
    const merged = applyPreset(manifest, request.preset, request.params ?? {});
    const params = this.resolveSeeds(manifest, merged);
    const result = patchWorkflow(template, manifest, params);
    return { manifest, params, result };
  }

  /** Replace the `-1` sentinel on declared integer seed params with a random seed. */
  private resolveSeeds(manifest: Manifest, params: Record<string, unknown>): Record<string, unknown> {
    const out = { ...params };
    for (const name of this.deps.seedParams) {
      const spec = manifest.params.get(name);
      if (spec?.type !== 'integer') continue;
      const value = (Object.hasOwn(out, name) ? out[name] : undefined) ?? spec.default;
      if (value === -1 || value === '-1') {
        const low = Math.max(0, spec.min ?? 0);
        const high = Math.min(MAX_SEED, spec.max ?? MAX_SEED);
        out[name] = low + Math.floor(this.random() * (high - low + 1));
      }
    }
    return out;
  }

  private storedParams(manifest: Manifest, params: Record<string, unknown>): Record<string, unknown> {
    if (this.deps.unknownParams === 'retain') {
      return { ...params };
    }
    return Object.fromEntries(Object.entries(params).filter(([key]) => manifest.params.has(key)));
  }
}
