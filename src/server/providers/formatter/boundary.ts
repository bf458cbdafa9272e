/**
 * Block boundary detection
 *
 * Blank lines, a bare `echo;` and decorative comment banners split a file
 * into blocks that are aligned independently.
 */

const DECORATIVE_CHARS = '#-_=+|';
const BANNER_MIN_LENGTH = 10;
const BANNER_MIN_RATIO = 0.6;

/**
 * A `//+...` comment line used as a section divider, e.g. `//+==========`
 * or `//+ *** Binds ***`
 */
export function isSeparatorCommentLine(line: string): boolean {
  const trimmed = line.trimStart();
  if (!trimmed.startsWith('//')) {
    return false;
  }
  const body = trimmed.slice(2).trimStart();
  if (!body.startsWith('+')) {
    return false;
  }
  if (body.includes('*')) {
    return true;
  }
  let decorative = 0;
  for (const ch of body) {
    if (DECORATIVE_CHARS.includes(ch)) {
      decorative++;
    }
  }
  const ratio = decorative / Math.max(1, body.length);
  return ratio >= BANNER_MIN_RATIO && body.length >= BANNER_MIN_LENGTH;
}

export function isBlockBoundary(line: string): boolean {
  const trimmed = line.trim().toLowerCase();
  if (trimmed === '' || trimmed === 'echo;') {
    return true;
  }
  return isSeparatorCommentLine(line);
}
