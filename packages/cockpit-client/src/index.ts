export { CockpitClient, CockpitApiError } from './client.js';
export type {
  CockpitClientConfig,
  HealthResult,
  JobInput,
  JobRecord,
  JobStatus,
  ListJobsOptions,
  ParamDescription,
  ParamValue,
  PreviewResult,
  ReloadResult,
  WorkflowDetail,
  WorkflowSummary,
} from './client.js';
