import { describe, it, expect, vi } from 'vitest';
import { CockpitClient, CockpitApiError } from './client.js';

function mockFetch(body: unknown, status = 200) {
  return vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } }),
  );
}

describe('CockpitClient', () => {
  it('strips trailing slashes from the base URL', async () => {
    const fetchMock = mockFetch({ ok: true, workflows: [] });
    const client = new CockpitClient({ baseUrl: 'http://cockpit.test//', fetch: fetchMock });

    await client.listWorkflows();

    expect(fetchMock).toHaveBeenCalledWith('http://cockpit.test/api/workflows', {
      method: 'GET',
      headers: undefined,
      body: undefined,
    });
  });

  it('unwraps the workflow envelope', async () => {
    const workflow = { id: 'wf', name: 'WF', description: '', version: '1', params: {}, presets: {} };
    const client = new CockpitClient({
      baseUrl: 'http://cockpit.test',
      fetch: mockFetch({ ok: true, workflow }),
    });

    expect(await client.getWorkflow('wf')).toEqual(workflow);
  });

  it('posts job input as JSON', async () => {
    const job = { id: 'j1', workflow_id: 'wf', status: 'submitted' };
    const fetchMock = mockFetch({ ok: true, job }, 201);
    const client = new CockpitClient({ baseUrl: 'http://cockpit.test', fetch: fetchMock });

    const result = await client.createJob({ workflow_id: 'wf', params: { prompt: 'a cat' } });

    expect(result).toEqual(job);
    expect(fetchMock).toHaveBeenCalledWith('http://cockpit.test/api/jobs', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ workflow_id: 'wf', params: { prompt: 'a cat' } }),
    });
  });

  it('uploads images as multipart form data', async () => {
    const fetchMock = mockFetch({ ok: true, filename: 'upload_20260101_000000_abcdef0123.png' });
    const client = new CockpitClient({ baseUrl: 'http://cockpit.test', fetch: fetchMock });

    const name = await client.uploadImage(new Blob(['png-bytes'], { type: 'image/png' }), 'cat.png');

    expect(name).toBe('upload_20260101_000000_abcdef0123.png');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://cockpit.test/api/uploads/image');
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toBeUndefined();
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    const file = body.get('file');
    expect(file).toBeInstanceOf(Blob);
    if (!(file instanceof Blob)) return;
    expect(await file.text()).toBe('png-bytes');
  });

  it('builds the job list query string', async () => {
    const fetchMock = mockFetch({ ok: true, jobs: [] });
    const client = new CockpitClient({ baseUrl: 'http://cockpit.test', fetch: fetchMock });

    await client.listJobs({ limit: 5, status: 'failed' });

    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://cockpit.test/api/jobs?limit=5&status=failed');
  });

  it('encodes ids in the path', async () => {
    const fetchMock = mockFetch({ ok: true, job: {} });
    const client = new CockpitClient({ baseUrl: 'http://cockpit.test', fetch: fetchMock });

    await client.getJob('a/b');

    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://cockpit.test/api/jobs/a%2Fb');
  });

  it('throws CockpitApiError with the status and error code', async () => {
    const body = { ok: false, error: { code: 'WORKFLOW_NOT_FOUND', message: 'Workflow not found: nope' } };
    const client = new CockpitClient({
      baseUrl: 'http://cockpit.test',
      fetch: mockFetch(body, 404),
    });

    const err = await client.getWorkflow('nope').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CockpitApiError);
    if (!(err instanceof CockpitApiError)) return;
    expect(err.endpoint).toBe('workflow');
    expect(err.statusCode).toBe(404);
    expect(err.code).toBe('WORKFLOW_NOT_FOUND');
    expect(err.message).toBe(`Cockpit API error on workflow: 404 - ${JSON.stringify(body)}`);
  });

  it('has no code when the error body is not JSON', () => {
    const err = new CockpitApiError('jobs', 500, 'upstream exploded');
    expect(err.code).toBeUndefined();
  });
});
