const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const MAX_FILENAME_LENGTH = 100;
const PLACEHOLDER = 'untitled';

/**
 * Make a title or summary usable as a filename segment.
 *
 * @example
 * sanitizeFilename('My/Note:"Title"') // 'MyNoteTitle'
 * sanitizeFilename('???')             // 'untitled'
 */
export function sanitizeFilename(value: string): string {
  const cleaned = value.replace(INVALID_FILENAME_CHARS, '').trim();
  // Count code points so an emoji at the cut is kept whole
  return Array.from(cleaned || PLACEHOLDER).slice(0, MAX_FILENAME_LENGTH).join('');
}
