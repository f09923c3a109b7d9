/**
 * Shared extension helpers used by the sequence matcher's extension mask.
 */

/**
 * Still-image extensions that commonly appear as numbered frame sequences
 * in render and scan output. Pass as `extensions` to restrict a scan to
 * image frames.
 */
export const IMAGE_SEQUENCE_EXTENSIONS = [
  'png', 'jpg', 'jpeg', 'webp', 'gif', 'bmp',
  'tif', 'tiff',
  'exr', 'sxr', 'dpx', 'cin', 'hdr', 'pic',
  'avif', 'jxl', 'heic', 'heif', 'tga', 'sgi', 'rgb',
  // RAW formats
  'cr2', 'cr3', 'nef', 'arw', 'dng', 'raf', 'orf', 'rw2',
] as const;

/**
 * Text after the last `.` of a filename, case preserved.
 * Names without a dot, or ending in one, have no extension.
 */
export function getFileExtension(filename: string): string {
  const dotIdx = filename.lastIndexOf('.');
  if (dotIdx === -1 || dotIdx === filename.length - 1) {
    return '';
  }
  return filename.slice(dotIdx + 1);
}

/**
 * Normalize a caller-supplied extension mask: accepts a single extension or
 * any iterable of them, strips leading dots, drops empties.
 * Returns null when the mask is absent or empty (no filtering).
 */
export function normalizeExtensions(
  extensions: string | Iterable<string> | undefined
): ReadonlySet<string> | null {
  if (extensions === undefined) return null;
  const list = typeof extensions === 'string' ? [extensions] : Array.from(extensions);
  const normalized = new Set<string>();
  for (const ext of list) {
    const stripped = ext.replace(/^\.+/, '');
    if (stripped) normalized.add(stripped);
  }
  return normalized.size > 0 ? normalized : null;
}
