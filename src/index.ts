import { existsSync } from 'node:fs';
import { randomUUID } from 'node:crypto';
import { join, resolve } from 'node:path';
import { getDb } from './db/db.js';
import { loadConfig } from './config/loader.js';
import { startServer, VERSION } from './server/server.js';
import { WorkflowRegistry } from './workflows/registry.js';
import { ComfyClient } from './backend/comfy-client.js';
import { JobStore } from './jobs/store.js';
import { JobService } from './jobs/service.js';

const configPath = process.argv[2] ?? resolve('cockpit.yaml');

if (!existsSync(configPath)) {
  console.log(`Media cockpit v${VERSION}`);
  console.log(`\nNo config file found at: ${configPath}`);
  console.log('Copy cockpit.example.yaml to cockpit.yaml and edit it to get started.');
  process.exit(1);
}

const config = loadConfig(configPath);
const db = getDb(join(resolve(config.data_dir), 'cockpit.db'));

const registry = new WorkflowRegistry({
  root: resolve(config.workflows_dir),
  onDiagnostic: (d) => {
    const log = d.level === 'error' ? console.error : console.warn;
    log(`[registry] ${d.level} ${d.code}${d.workflowId ? ` (${d.workflowId})` : ''}: ${d.message}`);
  },
});
const { count, failed } = registry.reload();
console.log(`[registry] loaded ${count} workflow(s) from ${config.workflows_dir}, ${failed.length} failed`);

const backend = new ComfyClient({ baseUrl: config.backend.url, timeoutMs: config.backend.timeout_ms });

const jobs = new JobService({
  registry,
  store: new JobStore(db),
  backend,
  clientId: randomUUID(),
  unknownParams: config.jobs.unknown_params,
  seedParams: config.jobs.seed_params,
});

startServer({
  registry,
  jobs,
  backend,
  config,
  models: {
    checkpointsDir: config.models.checkpoints_dir && resolve(config.models.checkpoints_dir),
    vaeDir: config.models.vae_dir && resolve(config.models.vae_dir),
  },
  uploadDir: config.backend.input_dir && resolve(config.backend.input_dir),
});
