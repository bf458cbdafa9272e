/**
 * Format driver: classify, chunk, align, render and guard a whole document
 */

import { detectNewline, normalizeLine, splitLines, textLength } from '../../../shared/textUtils';
import { ConfigurationError } from '../../utils/errors';
import { calculateAlignment, calculateCommentColumn } from './alignment';
import { classifyLines } from './classifier';
import { attachComment, formatCommandCode, RenderedCode } from './lineFormatting';
import { guardLine } from './signature';
import {
  AlignmentParams,
  BoundaryRecord,
  ChunkOutput,
  ChunkRecord,
  CommandRecord,
  FormatOptions,
  FormatResult,
  LineRecord,
  emptyCounts,
  incrementCount,
  mergeCounts
} from './types';

/**
 * Renders the code part of a command line. Replaceable for testing the guard.
 */
export type CodeRenderer = (
  record: CommandRecord,
  params: AlignmentParams,
  options: FormatOptions
) => RenderedCode;

/**
 * Align and render one chunk. Pass records are emitted as normalized lines
 * and take no part in alignment.
 */
export function formatChunk(
  records: ChunkRecord[],
  options: FormatOptions,
  renderCode: CodeRenderer = formatCommandCode
): ChunkOutput {
  const commands = records.filter((record): record is CommandRecord => record.kind === 'command');
  const params = calculateAlignment(commands, options);
  let counts = emptyCounts();

  const codes = new Map<number, string>();
  const commentedCodeLengths: number[] = [];
  for (const record of commands) {
    const rendered = renderCode(record, params, options);
    codes.set(record.lineNumber, rendered.code);
    if (rendered.counter) {
      counts = incrementCount(counts, rendered.counter);
    }
    if (record.comment) {
      commentedCodeLengths.push(textLength(rendered.code));
    }
  }
  const commentColumn = calculateCommentColumn(commentedCodeLengths, options.commentCap);

  const lines: string[] = [];
  const sigFailLines: number[] = [];
  for (const record of records) {
    let rendered = record.normalized;
    if (record.kind === 'command') {
      const code = codes.get(record.lineNumber) ?? record.normalized;
      const attached = attachComment(code, record.comment, commentColumn);
      if (attached.aligned) {
        counts = incrementCount(counts, 'commentAligned');
      }
      rendered = normalizeLine(attached.line, options.tabWidth);
    }
    const guarded = guardLine(record.original, rendered, options.tabWidth);
    if (guarded.failed) {
      sigFailLines.push(record.lineNumber);
    }
    lines.push(guarded.line);
  }

  return { lines, sigFailLines, counts };
}

function formatBoundary(record: BoundaryRecord, options: FormatOptions): ChunkOutput {
  const guarded = guardLine(record.original, record.normalized, options.tabWidth);
  return {
    lines: [guarded.line],
    sigFailLines: guarded.failed ? [record.lineNumber] : [],
    counts: emptyCounts()
  };
}

/**
 * Format a complete document
 */
export function formatText(text: string, options: FormatOptions): FormatResult {
  const mode: string = options.alignMode;
  if (mode !== 'global' && mode !== 'block') {
    throw new ConfigurationError(`Align mode must be "global" or "block", got "${mode}"`);
  }

  const newline = detectNewline(text);
  const keepFinalNewline = text.endsWith('\n');
  const sourceLines = splitLines(text);
  const records = classifyLines(sourceLines, options.tabWidth, options.alignMode);

  const slots: string[] = new Array<string>(records.length);
  const sigFailLines: number[] = [];
  let counts = emptyCounts();

  const emit = (placed: readonly LineRecord[], output: ChunkOutput): void => {
    placed.forEach((record, index) => {
      slots[record.lineNumber - 1] = output.lines[index] ?? record.normalized;
    });
    sigFailLines.push(...output.sigFailLines);
    counts = mergeCounts(counts, output.counts);
  };

  switch (options.alignMode) {
    case 'global': {
      const chunk = records.filter((record): record is ChunkRecord => record.kind !== 'boundary');
      const boundaries = records.filter((record): record is BoundaryRecord => record.kind === 'boundary');
      emit(chunk, formatChunk(chunk, options));
      for (const boundary of boundaries) {
        emit([boundary], formatBoundary(boundary, options));
      }
      sigFailLines.sort((a, b) => a - b);
      break;
    }
    case 'block': {
      let pending: ChunkRecord[] = [];
      for (const record of records) {
        if (record.kind !== 'boundary') {
          pending.push(record);
          continue;
        }
        if (pending.length > 0) {
          emit(pending, formatChunk(pending, options));
          pending = [];
        }
        emit([record], formatBoundary(record, options));
      }
      if (pending.length > 0) {
        emit(pending, formatChunk(pending, options));
      }
      break;
    }
  }

  let output = slots.join(newline);
  if (keepFinalNewline) {
    output += newline;
  }

  return {
    text: output,
    changed: output !== text,
    sigFailLines,
    stats: {
      totalLines: sourceLines.length,
      alignMode: options.alignMode,
      ...counts
    }
  };
}
