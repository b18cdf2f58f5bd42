import { describe, it, expect, vi } from 'vitest';
import { ComfyClient } from './comfy-client.js';
import { BackendError } from './types.js';
import { buildTemplate } from '../template/loader.js';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function respond(body: string, status = 200) {
  return vi.fn(async (..._args: FetchArgs) => new Response(body, { status }));
}

const graph = buildTemplate({ '1': { class_type: 'SaveImage', inputs: { filename_prefix: 'x' } } });

async function captureError(promise: Promise<unknown>): Promise<BackendError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof BackendError)) {
    throw new Error(`expected BackendError, got ${String(err)}`);
  }
  return err;
}

describe('ComfyClient', () => {
  it('posts the graph with the client id', async () => {
    const fetchMock = respond(JSON.stringify({ prompt_id: 'abc', number: 3 }));
    const client = new ComfyClient({ baseUrl: 'http://gpu.test:8188/', fetch: fetchMock });

    const result = await client.submitPrompt(graph, 'client-1');

    expect(result).toEqual({ prompt_id: 'abc', number: 3 });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://gpu.test:8188/prompt');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ prompt: graph, client_id: 'client-1' }));
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('leaves number undefined when the backend omits it', async () => {
    const client = new ComfyClient({ baseUrl: 'http://gpu.test', fetch: respond('{"prompt_id":"p"}') });
    expect(await client.submitPrompt(graph, 'c')).toEqual({ prompt_id: 'p', number: undefined });
  });

  it('raises BackendError with a truncated body on HTTP errors', async () => {
    const client = new ComfyClient({ baseUrl: 'http://gpu.test', fetch: respond('e'.repeat(2500), 400) });

    const err = await captureError(client.submitPrompt(graph, 'c'));

    expect(err.endpoint).toBe('/prompt');
    expect(err.statusCode).toBe(400);
    expect(err.body).toHaveLength(2000);
  });

  it('raises BackendError when prompt_id is missing', async () => {
    const client = new ComfyClient({ baseUrl: 'http://gpu.test', fetch: respond('{"error":"nope"}') });

    const err = await captureError(client.submitPrompt(graph, 'c'));

    expect(err.statusCode).toBeNull();
    expect(err.message).toBe(
      'Generation backend request to /prompt failed: response did not include prompt_id: {"error":"nope"}',
    );
  });

  it('wraps network failures', async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const client = new ComfyClient({ baseUrl: 'http://gpu.test', fetch: fetchMock });

    const err = await captureError(client.getSystemStats());

    expect(err.message).toBe('Generation backend request to /system_stats failed: fetch failed');
  });

  it('rejects non-JSON and non-object responses', async () => {
    const text = new ComfyClient({ baseUrl: 'http://gpu.test', fetch: respond('<html>') });
    const list = new ComfyClient({ baseUrl: 'http://gpu.test', fetch: respond('[1]') });

    expect((await captureError(text.getSystemStats())).body).toBe('response is not valid JSON');
    expect((await captureError(list.getSystemStats())).body).toBe('expected a JSON object in the response');
  });
});
