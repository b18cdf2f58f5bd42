import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import { cockpitConfigSchema } from './schema.js';
import type { CockpitConfigParsed } from './schema.js';

export class ConfigError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = 'ConfigError';
  }
}

const ENV_PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Replace `${VAR}` placeholders in every string of a parsed document. */
function resolveEnv(value: unknown, source: string): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_PLACEHOLDER, (_match, name: string) => {
      const resolved = process.env[name];
      if (resolved === undefined) {
        throw new ConfigError(`Environment variable ${name} is not set`, source);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnv(item, source));
  }
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, resolveEnv(v, source)]));
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Later documents win; nested objects merge, arrays and scalars replace. */
function mergeDocuments(base: Record<string, unknown>, next: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const existing = out[key];
    out[key] = isRecord(existing) && isRecord(value) ? mergeDocuments(existing, value) : value;
  }
  return out;
}

function readDocument(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new ConfigError('Config file not found', path);
  }
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML: ${reason}`, path);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError('Config must be a YAML mapping', path);
  }
  const resolved = resolveEnv(parsed, path);
  return isRecord(resolved) ? resolved : {};
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function validate(doc: Record<string, unknown>, source?: string): CockpitConfigParsed {
  const result = cockpitConfigSchema.safeParse(doc);
  if (!result.success) {
    throw new ConfigError(`Invalid config: ${formatIssues(result.error)}`, source);
  }
  return result.data;
}

export function loadConfig(path: string): CockpitConfigParsed {
  return validate(readDocument(path), path);
}

/** Merge several config files in order, then validate the result once. */
export function loadConfigFiles(paths: readonly string[]): CockpitConfigParsed {
  const merged = paths.map((path) => readDocument(path)).reduce<Record<string, unknown>>(mergeDocuments, {});
  return validate(merged, paths.join(', ') || undefined);
}
