/**
 * Alignment calculation for a chunk of command lines
 */

import { textLength, visualWidth } from '../../../shared/textUtils';
import type { AlignmentParams, CommandRecord, EchoRow, FormatOptions } from './types';

export interface TwoQuoted {
  first: string;
  second: string;
  tail: string;
}

/**
 * Extract two leading quoted strings: `"a" "b" tail`. Returns null when the
 * text does not start with two complete quoted strings.
 */
export function splitTwoQuoted(rest: string): TwoQuoted | null {
  const match = rest.match(/^\s*("[^"]*")\s*("[^"]*")/);
  if (!match) {
    return null;
  }
  const [whole, first, second] = match;
  if (whole === undefined || first === undefined || second === undefined) {
    return null;
  }
  return { first, second, tail: rest.slice(whole.length) };
}

const CJK = /[一-鿿]/;
const ALNUM = /[A-Za-z0-9]/;
const ART_CHUNK = /[_/\\]{2,}/;

/**
 * Whether an echo line looks like a row of a text table rather than art.
 * The thresholds are empirical.
 */
export function isEchoTableCandidate(record: CommandRecord, options: FormatOptions): boolean {
  if (!options.echoAlignTables || record.comment || record.keyLower !== 'echo') {
    return false;
  }

  const body = record.rest.trim();
  if (!body.includes('|')) {
    return false;
  }
  if (body.startsWith('~~~')) {
    return false;
  }
  if (body.includes('【') && body.includes('】') && (body.includes('*') || body.includes('~'))) {
    return false;
  }

  const pipeCount = body.split('|').length - 1;
  const hasCjk = CJK.test(body);
  const hasAlnum = ALNUM.test(body);
  const hasArtChunk = ART_CHUNK.test(body);
  if (!hasCjk && !hasAlnum && pipeCount <= 3) {
    return false;
  }
  if (!hasCjk && hasArtChunk && pipeCount <= 2) {
    return false;
  }
  return true;
}

/**
 * Split an echo body into trimmed fields, noting a framing pipe on either side
 */
export function parseEchoRow(rest: string): EchoRow {
  const body = rest.trim();
  const leadingPipe = body.startsWith('|');
  const trailingPipe = body.endsWith('|');
  const core = leadingPipe || trailingPipe ? body.replace(/^\|+/, '').replace(/\|+$/, '') : body;
  return {
    fields: core.split('|').map(field => field.trim()),
    leadingPipe,
    trailingPipe
  };
}

/**
 * Compute the shared columns for the command records of one chunk
 */
export function calculateAlignment(commands: CommandRecord[], options: FormatOptions): AlignmentParams {
  let widest = 0;
  let hasValue = false;
  for (const record of commands) {
    if (record.rest !== '') {
      widest = Math.max(widest, textLength(record.indent) + textLength(record.key));
      hasValue = true;
    }
  }
  const maxKeyWidth = hasValue ? Math.min(widest, options.keyCap) : 0;
  const valueColumn = maxKeyWidth + 1;

  let maxFirstQuoteLength = 0;
  for (const record of commands) {
    if (record.rest === '' || !options.specialAlignKeys.has(record.keyLower)) {
      continue;
    }
    const quoted = splitTwoQuoted(record.rest);
    if (quoted) {
      maxFirstQuoteLength = Math.max(maxFirstQuoteLength, textLength(quoted.first));
    }
  }
  const secondColumn = valueColumn + maxFirstQuoteLength + 1;

  const echoRows = new Map<number, EchoRow>();
  const tableRows: string[][] = [];
  for (const record of commands) {
    if (!isEchoTableCandidate(record, options)) {
      continue;
    }
    const row = parseEchoRow(record.rest);
    echoRows.set(record.lineNumber, row);
    if (!row.leadingPipe && !row.trailingPipe) {
      tableRows.push(row.fields);
    }
  }

  const echoColumnWidths: number[] = [];
  for (const fields of tableRows) {
    fields.forEach((field, index) => {
      echoColumnWidths[index] = Math.max(echoColumnWidths[index] ?? 0, visualWidth(field));
    });
  }

  return {
    maxKeyWidth,
    valueColumn,
    maxFirstQuoteLength,
    secondColumn,
    echoColumnWidths,
    echoRows
  };
}

/**
 * Target column for trailing comments, or null when no line has a comment
 */
export function calculateCommentColumn(codeLengths: number[], commentCap: number): number | null {
  if (codeLengths.length === 0) {
    return null;
  }
  return Math.min(Math.max(...codeLengths), commentCap);
}
