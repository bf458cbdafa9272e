/**
 * Line rendering with computed paddings
 */

import { textLength, visualWidth } from '../../../shared/textUtils';
import { splitTwoQuoted } from './alignment';
import type { AlignmentParams, CommandRecord, EchoRow, FormatOptions, StatCounter } from './types';

export interface RenderedCode {
  code: string;
  counter: StatCounter | null;
}

function spaces(count: number): string {
  return ' '.repeat(Math.max(0, count));
}

/**
 * Render an echo row as a table: unframed rows are padded to the column
 * widths, framed rows are only re-joined.
 */
export function formatEchoRow(row: EchoRow, columnWidths: number[]): string {
  if (row.leadingPipe || row.trailingPipe) {
    const middle = row.fields.join(' | ').trim();
    return (row.leadingPipe ? '| ' : '') + middle + (row.trailingPipe ? ' |' : '');
  }
  const padded = row.fields.map((field, index) => {
    const width = columnWidths[index] ?? visualWidth(field);
    return field + spaces(width - visualWidth(field));
  });
  return padded.join(' | ').trimEnd();
}

/**
 * Render the code part (everything before the comment) of a command line
 */
export function formatCommandCode(
  record: CommandRecord,
  params: AlignmentParams,
  options: FormatOptions
): RenderedCode {
  const { indent, key, rest, keyLower } = record;

  if (keyLower === 'echo') {
    const row = params.echoRows.get(record.lineNumber);
    if (row && params.echoColumnWidths.length > 0) {
      return {
        code: `${indent}${key} ${formatEchoRow(row, params.echoColumnWidths)}`,
        counter: 'echoTableAligned'
      };
    }
    return { code: indent + key + rest, counter: null };
  }

  if (rest === '') {
    return { code: indent + key, counter: 'cmdNoRest' };
  }

  const leftLength = textLength(indent) + textLength(key);
  const valuePad = Math.max(1, params.valueColumn - leftLength);
  const quoted = options.specialAlignKeys.has(keyLower) ? splitTwoQuoted(rest) : null;
  if (quoted) {
    const afterFirst = leftLength + valuePad + textLength(quoted.first);
    const secondPad = Math.max(1, params.secondColumn - afterFirst);
    return {
      code: indent + key + spaces(valuePad) + quoted.first + spaces(secondPad) + quoted.second + quoted.tail,
      counter: 'specialTwoQuoteAligned'
    };
  }

  return { code: indent + key + spaces(valuePad) + rest, counter: 'cmdValueAligned' };
}

/**
 * Attach a trailing comment at the comment column, or one space after code
 * that is already past it
 */
export function attachComment(code: string, comment: string, commentColumn: number | null): { line: string; aligned: boolean } {
  if (!comment) {
    return { line: code, aligned: false };
  }
  const codeLength = textLength(code);
  if (commentColumn !== null && codeLength <= commentColumn) {
    const pad = Math.max(1, commentColumn + 1 - codeLength);
    return { line: code + spaces(pad) + comment, aligned: true };
  }
  return { line: `${code} ${comment}`, aligned: false };
}
