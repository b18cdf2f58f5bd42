import { existsSync, readFileSync } from 'node:fs';
import type { Manifest } from './types.js';
import { ManifestError } from './errors.js';
import { buildManifest } from './validator.js';

/**
 * Parse manifest JSON text. The referenced template is not touched here;
 * pairing a manifest with its template is the registry's job.
 */
export function parseManifest(text: string, source?: string): Manifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ManifestError([`Invalid JSON: ${reason}`], source);
  }
  return buildManifest(raw, source);
}

export function loadManifest(path: string): Manifest {
  if (!existsSync(path)) {
    throw new ManifestError([`Manifest not found: ${path}`], path);
  }
  return parseManifest(readFileSync(path, 'utf-8'), path);
}
