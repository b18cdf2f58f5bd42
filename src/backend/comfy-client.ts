import type { Template } from '../template/types.js';
import { BackendError } from './types.js';
import type { GenerationBackend, SubmitResult } from './types.js';

const MAX_ERROR_BODY = 2000;

export interface ComfyClientConfig {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * HTTP client for a ComfyUI-compatible backend. Graphs are posted in the
 * backend's "API format" exactly as the patch engine produced them.
 */
export class ComfyClient implements GenerationBackend {
  readonly baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(config: ComfyClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 60_000;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async submitPrompt(graph: Template, clientId: string): Promise<SubmitResult> {
    const data = await this.request('/prompt', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ prompt: graph, client_id: clientId }),
    });

    const promptId = data.prompt_id;
    if (typeof promptId !== 'string' || promptId === '') {
      throw new BackendError('/prompt', null, `response did not include prompt_id: ${JSON.stringify(data).slice(0, MAX_ERROR_BODY)}`);
    }
    return {
      prompt_id: promptId,
      number: typeof data.number === 'number' ? data.number : undefined,
    };
  }

  async getSystemStats(): Promise<Record<string, unknown>> {
    return this.request('/system_stats', { method: 'GET' });
  }

  private async request(endpoint: string, init: RequestInit): Promise<Record<string, unknown>> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new BackendError(endpoint, null, err instanceof Error ? err.message : String(err));
    }

    if (!res.ok) {
      const text = await res.text();
      throw new BackendError(endpoint, res.status, text.slice(0, MAX_ERROR_BODY));
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new BackendError(endpoint, res.status, 'response is not valid JSON');
    }
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw new BackendError(endpoint, res.status, 'expected a JSON object in the response');
    }
    return Object.fromEntries(Object.entries(body));
  }
}
