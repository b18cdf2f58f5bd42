import { fileURLToPath } from 'node:url';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import type Database from 'better-sqlite3';
import type { Hono } from 'hono';
import { CockpitClient } from 'cockpit-client';
import { getDb } from '../../src/db/db.js';
import { createServer } from '../../src/server/server.js';
import { WorkflowRegistry } from '../../src/workflows/registry.js';
import { JobService } from '../../src/jobs/service.js';
import type { UnknownParamPolicy } from '../../src/jobs/service.js';
import { JobStore } from '../../src/jobs/store.js';
import { FakeBackend, makeTmpDir } from '../../src/test-utils.js';

/** The workflows shipped with the repository. */
export const SHIPPED_WORKFLOWS = fileURLToPath(new URL('../../workflows', import.meta.url));

export interface E2eApp {
  app: Hono;
  client: CockpitClient;
  backend: FakeBackend;
  registry: WorkflowRegistry;
  db: Database.Database;
  tmpDir: string;
}

export interface E2eOptions {
  workflowsDir?: string;
  unknownParams?: UnknownParamPolicy;
  random?: () => number;
}

export function setupE2eApp(options: E2eOptions = {}): E2eApp {
  const tmpDir = makeTmpDir();
  const db = getDb(join(tmpDir, 'cockpit.db'));
  const backend = new FakeBackend();
  const registry = new WorkflowRegistry({ root: options.workflowsDir ?? SHIPPED_WORKFLOWS });
  const jobs = new JobService({
    registry,
    store: new JobStore(db),
    backend,
    clientId: 'e2e-client',
    unknownParams: options.unknownParams ?? 'drop',
    seedParams: ['seed'],
    random: options.random,
  });
  const app = createServer({ registry, jobs, backend });

  const client = new CockpitClient({
    baseUrl: 'http://cockpit.test',
    fetch: async (input, init) => app.request(input, init),
  });

  return { app, client, backend, registry, db, tmpDir };
}

export function cleanup(db: Database.Database, tmpDir: string): void {
  db.close();
  rmSync(tmpDir, { recursive: true, force: true });
}
