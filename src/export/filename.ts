import { format } from 'date-fns';

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;

export function sanitizeFilename(name: string): string {
  return name.replace(UNSAFE_FILENAME_CHARS, '_');
}

/**
 * `{list name}_{yyyyMMdd_HHmmss}.{extension}` in local time.
 * Names are not deduplicated: equal names within one second collide.
 */
export function exportFilename(listName: string, at: Date, extension: string): string {
  return `${sanitizeFilename(listName)}_${format(at, 'yyyyMMdd_HHmmss')}.${extension}`;
}

export function attachmentFilename(name: string): string {
  return `attachment_${sanitizeFilename(name)}`;
}
