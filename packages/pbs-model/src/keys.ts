/**
 * Characters that cannot appear in a key addressed through a JSONPath member
 * expression, with their replacement. The mapping is lossy: `a.b` and `a_b`
 * collide, so records keep their original identifier in `id`.
 */
export const KEY_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['.', '_'],
  ['[', '_'],
  [']', '']
];

export function sanitizeKey(key: string): string {
  return KEY_REPLACEMENTS.reduce((current, [from, to]) => current.split(from).join(to), key);
}
