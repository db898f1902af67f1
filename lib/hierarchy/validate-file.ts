/**
 * Safe-identifier check for explicit template overrides.
 * Purely lexical: nothing here touches the filesystem.
 */

const DRIVE_PREFIX_RE = /^[a-zA-Z]:/;

/** True when `filePath` is a relative identifier that cannot leave its base directory. */
export function isSafeRelativePath(filePath: string): boolean {
  if (!filePath || filePath.includes('\0')) return false;

  const normalized = filePath.replace(/\\/g, '/');

  if (normalized.startsWith('/')) return false;
  if (DRIVE_PREFIX_RE.test(normalized)) return false;

  const segments = normalized.split('/');
  return !segments.some((segment) => segment === '..' || segment === '.');
}
