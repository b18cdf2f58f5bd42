/**
 * Thin HTTP client for the media cockpit API. It knows the routes and the
 * response envelopes; validation and patching stay on the server.
 */

export type ParamValue = string | number | boolean;
export type JobStatus = 'queued' | 'submitted' | 'failed';

export interface WorkflowSummary {
  id: string;
  name: string;
  description: string;
  version: string;
}

export interface ParamDescription {
  type: 'string' | 'integer' | 'number' | 'boolean' | 'image';
  required: boolean;
  patch: { node_id: string; field: string };
  default?: ParamValue;
  choices?: ParamValue[];
  min?: number;
  max?: number;
  label?: string;
  description?: string;
  upload?: boolean;
}

export interface WorkflowDetail extends WorkflowSummary {
  params: Record<string, ParamDescription>;
  presets: Record<string, Record<string, unknown>>;
  quality_checks?: Record<string, unknown>;
}

export interface ReloadResult {
  count: number;
  failed: Array<{ id: string; message: string }>;
}

export interface JobRecord {
  id: string;
  workflow_id: string;
  status: JobStatus;
  prompt_id: string | null;
  params: Record<string, unknown>;
  resolved_params: Record<string, ParamValue>;
  error: string | null;
  created_at: string;
  updated_at: string;
}

export interface JobInput {
  workflow_id: string;
  params?: Record<string, unknown>;
  preset?: string;
}

export interface PreviewResult {
  workflow_id: string;
  resolved: Record<string, ParamValue>;
  graph: Record<string, { class_type: string; inputs: Record<string, unknown> }>;
}

export interface HealthResult {
  ok: boolean;
  backend_url: string;
  error: string | null;
}

export interface ListJobsOptions {
  limit?: number;
  workflowId?: string;
  status?: JobStatus;
}

export interface CockpitClientConfig {
  baseUrl: string;
  /** Defaults to the global fetch. */
  fetch?: typeof fetch;
}

export class CockpitClient {
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(config: CockpitClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = config.fetch ?? fetch;
  }

  /** Backend reachability as seen by the server. */
  async health(): Promise<HealthResult> {
    return this.request<HealthResult>('health', '/api/health');
  }

  async listWorkflows(): Promise<WorkflowSummary[]> {
    const data = await this.request<{ workflows: WorkflowSummary[] }>('workflows', '/api/workflows');
    return data.workflows;
  }

  async getWorkflow(workflowId: string): Promise<WorkflowDetail> {
    const data = await this.request<{ workflow: WorkflowDetail }>(
      'workflow',
      `/api/workflows/${encodeURIComponent(workflowId)}`,
    );
    return data.workflow;
  }

  async reloadWorkflows(): Promise<ReloadResult> {
    const data = await this.request<ReloadResult>('reload', '/api/workflows/reload', { method: 'POST' });
    return { count: data.count, failed: data.failed };
  }

  /** Patch a workflow on the server without submitting it. */
  async previewJob(workflowId: string, input: Omit<JobInput, 'workflow_id'> = {}): Promise<PreviewResult> {
    return this.request<PreviewResult>('preview', `/api/workflows/${encodeURIComponent(workflowId)}/preview`, {
      method: 'POST',
      body: input,
    });
  }

  /**
   * Upload an image into the backend's input directory. The returned file
   * name is the value to pass for an `image` param.
   */
  async uploadImage(image: Blob, filename: string): Promise<string> {
    const form = new FormData();
    form.append('file', image, filename);
    const data = await this.request<{ filename: string }>('upload', '/api/uploads/image', { method: 'POST', form });
    return data.filename;
  }

  /**
   * Submit a job. A job the backend refused comes back as a 502 and is
   * thrown as a CockpitApiError whose body carries the failed job.
   */
  async createJob(input: JobInput): Promise<JobRecord> {
    const data = await this.request<{ job: JobRecord }>('jobs', '/api/jobs', { method: 'POST', body: input });
    return data.job;
  }

  async getJob(jobId: string): Promise<JobRecord> {
    const data = await this.request<{ job: JobRecord }>('job', `/api/jobs/${encodeURIComponent(jobId)}`);
    return data.job;
  }

  async listJobs(options: ListJobsOptions = {}): Promise<JobRecord[]> {
    const query = new URLSearchParams();
    if (options.limit !== undefined) query.set('limit', String(options.limit));
    if (options.workflowId) query.set('workflow_id', options.workflowId);
    if (options.status) query.set('status', options.status);
    const qs = query.toString();
    const suffix = qs ? `?${qs}` : '';
    const data = await this.request<{ jobs: JobRecord[] }>('jobs', `/api/jobs${suffix}`);
    return data.jobs;
  }

  private async request<T>(
    endpoint: string,
    path: string,
    init: { method?: string; body?: unknown; form?: FormData } = {},
  ): Promise<T> {
    // Multipart bodies set their own content type with the boundary.
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: init.method ?? 'GET',
      headers: init.body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: init.form ?? (init.body === undefined ? undefined : JSON.stringify(init.body)),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new CockpitApiError(endpoint, res.status, text);
    }

    return res.json() as Promise<T>;
  }
}

export class CockpitApiError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly statusCode: number,
    public readonly body: string,
  ) {
    super(`Cockpit API error on ${endpoint}: ${statusCode} - ${body}`);
    this.name = 'CockpitApiError';
  }

  /** The server's error code, when the body is a JSON error envelope. */
  get code(): string | undefined {
    try {
      const parsed: unknown = JSON.parse(this.body);
      if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
        const { error } = parsed;
        if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
          return error.code;
        }
      }
    } catch {
      return undefined;
    }
    return undefined;
  }
}
