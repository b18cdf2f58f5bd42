import type { Template } from '../template/types.js';

export interface SubmitResult {
  /** Identifier the backend assigns to the queued graph. */
  prompt_id: string;
  /** Position in the backend's queue, when reported. */
  number?: number;
}

/**
 * The generation backend as seen by the job façade. Implemented over HTTP
 * by ComfyClient; tests supply an in-process fake.
 */
export interface GenerationBackend {
  readonly baseUrl: string;
  submitPrompt(graph: Template, clientId: string): Promise<SubmitResult>;
  getSystemStats(): Promise<Record<string, unknown>>;
}

export class BackendError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly statusCode: number | null,
    public readonly body: string,
  ) {
    super(
      statusCode === null
        ? `Generation backend request to ${endpoint} failed: ${body}`
        : `Generation backend error on ${endpoint}: ${statusCode} - ${body}`,
    );
    this.name = 'BackendError';
  }
}
