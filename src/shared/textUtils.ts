/**
 * Shared text utilities used by the formatter, the CLI and the language server
 */

/**
 * Whitespace that the formatter is allowed to add, remove or move.
 * Newlines never appear inside a split line.
 */
const LAYOUT_WHITESPACE = /[ \t\r\f\v]+/g;
const TRAILING_WHITESPACE = /[ \t\r\f\v]+$/;

/**
 * Split text into lines on LF, dropping the CR of CRLF endings.
 * A final line terminator does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (text.endsWith('\n')) {
    lines.pop();
  }
  return lines;
}

/**
 * Detect the newline style of a document. Any CRLF makes the whole document CRLF.
 */
export function detectNewline(text: string): '\r\n' | '\n' {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

/**
 * Replace every TAB with a fixed run of spaces (not tab stops)
 */
export function detab(line: string, tabWidth: number): string {
  return line.split('\t').join(' '.repeat(tabWidth));
}

/**
 * Remove trailing spaces, TABs and CR/FF/VT characters
 */
export function rstripWhitespace(line: string): string {
  return line.replace(TRAILING_WHITESPACE, '');
}

/**
 * Detab and strip trailing whitespace. This is the only change a line is
 * guaranteed to tolerate.
 */
export function normalizeLine(line: string, tabWidth: number): string {
  return rstripWhitespace(detab(line, tabWidth));
}

/**
 * The non-whitespace content of a line, in order
 */
export function signature(line: string): string {
  return line.replace(LAYOUT_WHITESPACE, '');
}

/**
 * Length in code points, so astral characters count once
 */
export function textLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Get the indentation (leading whitespace) of a line
 */
export function getIndentation(line: string): string {
  const match = line.match(/^(\s*)/);
  return match?.[1] ?? '';
}

const COMBINING_MARK = /^\p{Mn}$/u;

// Approximate East Asian Wide/Fullwidth ranges for a monospace terminal.
const WIDE_SYMBOLS: ReadonlyArray<readonly [number, number]> = [
  [0x231a, 0x231b], [0x2329, 0x232a], [0x23e9, 0x23ec], [0x23f0, 0x23f0], [0x23f3, 0x23f3],
  [0x25fd, 0x25fe], [0x2614, 0x2615], [0x2648, 0x2653], [0x267f, 0x267f],
  [0x2693, 0x2693], [0x26a1, 0x26a1], [0x26aa, 0x26ab], [0x26bd, 0x26be],
  [0x26c4, 0x26c5], [0x26ce, 0x26ce], [0x26d4, 0x26d4], [0x26ea, 0x26ea],
  [0x26f2, 0x26f3], [0x26f5, 0x26f5], [0x26fa, 0x26fa], [0x26fd, 0x26fd],
  [0x2705, 0x2705], [0x270a, 0x270b], [0x2728, 0x2728], [0x274c, 0x274c],
  [0x274e, 0x274e], [0x2753, 0x2755], [0x2757, 0x2757], [0x2795, 0x2797],
  [0x27b0, 0x27b0], [0x27bf, 0x27bf], [0x2b1b, 0x2b1c], [0x2b50, 0x2b50],
  [0x2b55, 0x2b55]
];

function isWideCodePoint(cp: number): boolean {
  if (cp >= 0x231a && cp <= 0x2b55) {
    return WIDE_SYMBOLS.some(([low, high]) => cp >= low && cp <= high);
  }
  return (
    (cp >= 0x1100 && cp <= 0x115f) ||
    (cp >= 0x2e80 && cp <= 0xa4cf && cp !== 0x303f) || (cp >= 0xac00 && cp <= 0xd7a3) ||
    (cp >= 0xf900 && cp <= 0xfaff) || (cp >= 0xfe10 && cp <= 0xfe19) || (cp >= 0xfe30 && cp <= 0xfe6f) ||
    (cp >= 0xff00 && cp <= 0xff60) || (cp >= 0xffe0 && cp <= 0xffe6) ||
    (cp >= 0x1f300 && cp <= 0x1faff) ||
    (cp >= 0x20000 && cp <= 0x3fffd)
  );
}

/**
 * Display width of a string in a fixed-width terminal: wide and fullwidth
 * characters count 2, combining marks 0, everything else 1.
 */
export function visualWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    if (COMBINING_MARK.test(ch)) {
      continue;
    }
    const cp = ch.codePointAt(0) ?? 0;
    width += isWideCodePoint(cp) ? 2 : 1;
  }
  return width;
}
