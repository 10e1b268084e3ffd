import { createHash } from 'crypto';

export type KeyPart = string | number | boolean | bigint | null | undefined;

const SEPARATOR = '|';

/**
 * Derive an opaque cache key from a namespace and call arguments.
 *
 * Named arguments are sorted by name before joining, so two calls that
 * pass the same named values in a different order share a key.
 */
export function deriveKey(
  namespace: string,
  positional: readonly KeyPart[] = [],
  named: Readonly<Record<string, KeyPart>> = {}
): string {
  const parts = [namespace, ...positional.map((value) => String(value))];

  const names = Object.keys(named).sort();
  for (const name of names) {
    parts.push(`${name}:${String(named[name])}`);
  }

  return createHash('md5').update(parts.join(SEPARATOR), 'utf8').digest('hex');
}
