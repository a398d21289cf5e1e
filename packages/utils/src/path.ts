/**
 * Path Utilities
 */

import { isAbsolute, relative, resolve, sep } from 'node:path';

/**
 * Whether `child` is `parent` itself or lies beneath it.
 * Purely lexical: symlinks are not followed.
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  if (rel === '') {
    return true;
  }
  return !isAbsolute(rel) && rel !== '..' && !rel.startsWith(`..${sep}`);
}
