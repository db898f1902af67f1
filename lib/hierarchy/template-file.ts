import { HierarchyError } from '@/lib/errors/hierarchy-error';

/** Strip leading separators: `.twig` and `twig` both become `twig`. */
export function normalizeExtension(extension: string): string {
  const normalized = extension.trim().replace(/^\.+/, '');
  if (!normalized) {
    throw HierarchyError.invalidExtension(extension);
  }
  return normalized;
}

export function toTemplateFile(name: string, extension: string): string {
  return `${name}.${extension}`;
}

/**
 * Drop a trailing source extension from an override path:
 * `templates/landing.php` with `php` gives `templates/landing`.
 */
export function stripSourceExtension(path: string, sourceExtension: string): string {
  const suffix = `.${sourceExtension}`;
  return sourceExtension && path.endsWith(suffix) ? path.slice(0, -suffix.length) : path;
}
