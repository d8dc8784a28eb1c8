import { createHash } from 'node:crypto';

/**
 * Turn a cache key into a file-name stem that is safe on every platform.
 *
 * Readable keys are kept (sanitized); a short hash suffix keeps two keys that
 * sanitize to the same text apart.
 */
export function keyToFileStem(key: string): string {
  const readable = key.replace(/[^a-zA-Z0-9._-]+/g, '_').slice(0, 80);
  const digest = createHash('sha256').update(key).digest('hex').slice(0, 12);
  return `${readable}-${digest}`;
}
