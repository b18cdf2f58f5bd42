import { ManifestError } from '../manifest/errors.js';
import { PatchError } from '../patch/errors.js';
import { TemplateError } from '../template/loader.js';
import { WorkflowNotFoundError } from '../workflows/registry.js';
import { JobNotFoundError } from '../jobs/store.js';

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export interface ApiErrorBody {
  ok: false;
  error: { code: string; message: string } & Record<string, unknown>;
}

export interface MappedError {
  status: 400 | 404 | 500;
  body: ApiErrorBody;
}

/** Translate a thrown error into the API's status code and JSON body. */
export function mapError(err: Error): MappedError {
  if (err instanceof BadRequestError) {
    return { status: 400, body: { ok: false, error: { code: 'BAD_REQUEST', message: err.message } } };
  }
  if (err instanceof PatchError) {
    return { status: 400, body: { ok: false, error: { ...err.toJSON(), code: err.code.toUpperCase(), message: err.message } } };
  }
  if (err instanceof WorkflowNotFoundError) {
    return {
      status: 404,
      body: { ok: false, error: { code: 'WORKFLOW_NOT_FOUND', message: err.message, workflow_id: err.workflowId } },
    };
  }
  if (err instanceof JobNotFoundError) {
    return { status: 404, body: { ok: false, error: { code: 'JOB_NOT_FOUND', message: err.message, job_id: err.jobId } } };
  }
  // Manifest/template problems surface here only if a caller bypassed the registry.
  if (err instanceof ManifestError || err instanceof TemplateError) {
    return { status: 500, body: { ok: false, error: { code: 'INVALID_WORKFLOW', message: err.message } } };
  }
  return { status: 500, body: { ok: false, error: { code: 'INTERNAL', message: 'Internal server error' } } };
}
