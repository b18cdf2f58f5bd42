import type { JsonObject, JsonValue } from '../manifest/types.js';

export function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Dry run of `setAtPath`: returns the dotted prefix of `path` that already
 * exists but is not an object, or undefined when the write would succeed.
 */
export function findPathConflict(target: JsonObject, path: readonly string[]): string | undefined {
  let current: JsonObject = target;
  for (let i = 0; i < path.length - 1; i++) {
    const next = current[path[i]];
    if (next === undefined) return undefined;
    if (!isPlainObject(next)) return path.slice(0, i + 1).join('.');
    current = next;
  }
  return undefined;
}

/**
 * Write `value` at `path` inside `target`, creating missing intermediate
 * objects. Throws via `onConflict` when an existing intermediate is not an
 * object; nothing is written in that case.
 */
export function setAtPath(
  target: JsonObject,
  path: readonly string[],
  value: JsonValue,
  onConflict: (conflictAt: string) => Error,
): void {
  const conflict = findPathConflict(target, path);
  if (conflict !== undefined) {
    throw onConflict(conflict);
  }

  const [head, ...rest] = path;
  if (rest.length === 0) {
    target[head] = value;
    return;
  }

  const existing = target[head];
  const child: JsonObject = isPlainObject(existing) ? existing : {};
  target[head] = child;
  setAtPath(child, rest, value, onConflict);
}
