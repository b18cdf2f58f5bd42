import { readdirSync } from 'node:fs';
import type { Dirent } from 'node:fs';
import { extname } from 'node:path';

export const MODEL_EXTENSIONS = ['.safetensors', '.ckpt', '.pt'] as const;

/**
 * File names (not paths) of model files directly inside `dir`, sorted.
 * A directory that does not exist yields an empty list.
 */
export function scanModels(dir: string, extensions: readonly string[] = MODEL_EXTENSIONS): string[] {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissingDir(err)) return [];
    throw err;
  }
  return entries
    .filter((entry) => entry.isFile() && extensions.includes(extname(entry.name)))
    .map((entry) => entry.name)
    .sort();
}

function isMissingDir(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

export interface ModelDirs {
  checkpointsDir?: string;
  vaeDir?: string;
}

/**
 * Choice lists for the params that select a model file, keyed by param name.
 * Only params the manifest declares are scanned, and an empty scan adds
 * nothing so the manifest's own choices stay in place.
 */
export function modelChoices(dirs: ModelDirs, paramNames: ReadonlySet<string>): Map<string, string[]> {
  const sources: Array<[string, string | undefined]> = [
    ['checkpoint', dirs.checkpointsDir],
    ['vae', dirs.vaeDir],
  ];
  const choices = new Map<string, string[]>();
  for (const [param, dir] of sources) {
    if (!paramNames.has(param) || dir === undefined) continue;
    const files = scanModels(dir);
    if (files.length === 0) {
      console.warn(`[models] no ${param} files found in ${dir}`);
      continue;
    }
    console.log(`[models] scanned ${files.length} ${param} file(s) from ${dir}`);
    choices.set(param, files);
  }
  return choices;
}
