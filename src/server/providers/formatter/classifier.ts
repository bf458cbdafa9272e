/**
 * Line classification and tokenization
 */

import { getIndentation, normalizeLine, rstripWhitespace } from '../../../shared/textUtils';
import { isBlockBoundary } from './boundary';
import type { AlignMode, LineRecord } from './types';

const COMMENT_MARKER = '//';

/**
 * Index of the first `//` that is not inside a double-quoted region, or -1
 */
export function findCommentOutsideQuotes(line: string): number {
  let inQuote = false;
  for (let i = 0; i < line.length - 1; i++) {
    const ch = line[i];
    if (ch === '"') {
      inQuote = !inQuote;
      continue;
    }
    if (!inQuote && line.startsWith(COMMENT_MARKER, i)) {
      return i;
    }
  }
  return -1;
}

export interface IndentKeyRest {
  indent: string;
  key: string;
  rest: string;
}

/**
 * Split code into leading whitespace, first token and remainder.
 * Returns null for whitespace-only input.
 */
export function splitIndentKeyRest(code: string): IndentKeyRest | null {
  const indent = getIndentation(code);
  if (indent.length === code.length) {
    return null;
  }
  const afterIndent = code.slice(indent.length);
  const keyMatch = afterIndent.match(/^\S+/);
  const key = keyMatch?.[0] ?? '';
  const restRaw = afterIndent.slice(key.length);
  // echo keeps the spacing after the key: it is often ASCII art
  const rest = key.toLowerCase() === 'echo' ? restRaw : restRaw.replace(/^\s+/, '');
  return { indent, key, rest };
}

/**
 * Classify one raw input line
 */
export function classifyLine(
  original: string,
  lineNumber: number,
  tabWidth: number,
  alignMode: AlignMode
): LineRecord {
  const normalized = normalizeLine(original, tabWidth);
  const base = { original, normalized, lineNumber };

  if (alignMode === 'block' && isBlockBoundary(normalized)) {
    return { ...base, kind: 'boundary' };
  }
  if (normalized.trimStart().startsWith(COMMENT_MARKER)) {
    return { ...base, kind: 'pass' };
  }
  if (normalized.trim() === '') {
    return { ...base, kind: 'boundary' };
  }

  const commentPos = findCommentOutsideQuotes(normalized);
  const code = commentPos === -1 ? normalized : rstripWhitespace(normalized.slice(0, commentPos));
  const comment = commentPos === -1 ? '' : normalized.slice(commentPos);

  const parts = splitIndentKeyRest(code);
  if (!parts) {
    return { ...base, kind: 'pass' };
  }

  return {
    ...base,
    kind: 'command',
    indent: parts.indent,
    key: parts.key,
    keyLower: parts.key.toLowerCase(),
    rest: parts.rest,
    comment
  };
}

/**
 * Classify every line of a document
 */
export function classifyLines(lines: string[], tabWidth: number, alignMode: AlignMode): LineRecord[] {
  return lines.map((line, index) => classifyLine(line, index + 1, tabWidth, alignMode));
}
