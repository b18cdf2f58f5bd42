import { z } from 'zod';

const backendSchema = z.object({
  url: z.string().url().default('http://127.0.0.1:8188'),
  timeout_ms: z.number().int().positive().default(60_000),
  // Where uploaded images are written; the backend reads image inputs from here.
  input_dir: z.string().min(1).optional(),
});

const modelsSchema = z.object({
  checkpoints_dir: z.string().min(1).optional(),
  vae_dir: z.string().min(1).optional(),
});

const jobsSchema = z.object({
  // No default: whether undeclared params are kept on job records is a
  // deployment decision and must be written down in the config.
  unknown_params: z.enum(['retain', 'drop']),
  seed_params: z.array(z.string().min(1)).default(['seed']),
});

export const cockpitConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(8787),
  data_dir: z.string().default('./data'),
  workflows_dir: z.string().default('./workflows'),
  backend: backendSchema.default({}),
  models: modelsSchema.default({}),
  jobs: jobsSchema,
});

export type CockpitConfig = z.input<typeof cockpitConfigSchema>;
export type CockpitConfigParsed = z.output<typeof cockpitConfigSchema>;
