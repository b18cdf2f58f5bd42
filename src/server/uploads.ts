import { mkdirSync, writeFileSync } from 'node:fs';
import { randomUUID } from 'node:crypto';
import { extname, join } from 'node:path';

const SAFE_EXTENSION = /^\.[A-Za-z0-9]{1,10}$/;

/**
 * Name an uploaded image is stored under: `upload_<utc stamp>_<10 hex><ext>`.
 * Only the extension of the client's file name is kept; anything that is
 * not a short alphanumeric extension becomes `.png`.
 */
export function uploadFileName(original: string, now: Date = new Date(), id: string = randomUUID()): string {
  const ext = extname(original);
  const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  const suffix = id.replace(/-/g, '').slice(0, 10);
  return `upload_${stamp}_${suffix}${SAFE_EXTENSION.test(ext) ? ext : '.png'}`;
}

/** Write `data` into the backend's input directory and return the stored file name. */
export function storeUpload(inputDir: string, original: string, data: Uint8Array): string {
  const name = uploadFileName(original);
  mkdirSync(inputDir, { recursive: true });
  writeFileSync(join(inputDir, name), data);
  return name;
}
