/**
 * Types and interfaces for the cfg formatter
 */

export type AlignMode = 'global' | 'block';

export const ALIGN_MODES: readonly AlignMode[] = ['global', 'block'];

/**
 * Options for one formatting run. Resolved and frozen before the run starts.
 */
export interface FormatOptions {
  readonly alignMode: AlignMode;
  /** Spaces substituted for each TAB */
  readonly tabWidth: number;
  /** Maximum column for the value after a key */
  readonly keyCap: number;
  /** Maximum column for trailing comments */
  readonly commentCap: number;
  /** Lowercase keys whose two quoted arguments get their own column */
  readonly specialAlignKeys: ReadonlySet<string>;
  readonly echoAlignTables: boolean;
}

interface BaseRecord {
  /** The untouched input line, used for the signature check */
  original: string;
  /** Detabbed, right-stripped line */
  normalized: string;
  /** 1-based */
  lineNumber: number;
}

export interface BoundaryRecord extends BaseRecord {
  kind: 'boundary';
}

export interface PassRecord extends BaseRecord {
  kind: 'pass';
}

export interface CommandRecord extends BaseRecord {
  kind: 'command';
  indent: string;
  key: string;
  keyLower: string;
  /** Remainder after the key; leading whitespace kept only for echo */
  rest: string;
  /** `//...` suffix outside quotes, or empty */
  comment: string;
}

export type LineRecord = BoundaryRecord | PassRecord | CommandRecord;

/**
 * Records that share one alignment computation
 */
export type ChunkRecord = PassRecord | CommandRecord;

/**
 * Parsed echo row eligible for table alignment
 */
export interface EchoRow {
  fields: string[];
  leadingPipe: boolean;
  trailingPipe: boolean;
}

/**
 * Column positions shared by every command of a chunk
 */
export interface AlignmentParams {
  maxKeyWidth: number;
  valueColumn: number;
  maxFirstQuoteLength: number;
  secondColumn: number;
  /** Per-column visual widths; empty when the chunk has no unframed table row */
  echoColumnWidths: number[];
  /** Echo rows keyed by line number */
  echoRows: Map<number, EchoRow>;
}

/**
 * Counters collected while formatting. Informational only.
 */
export interface FormatStats {
  totalLines: number;
  alignMode: AlignMode;
  cmdValueAligned: number;
  specialTwoQuoteAligned: number;
  cmdNoRest: number;
  echoTableAligned: number;
  commentAligned: number;
}

export type StatCounter = Exclude<keyof FormatStats, 'totalLines' | 'alignMode'>;

export type StatCounts = Record<StatCounter, number>;

export interface FormatResult {
  text: string;
  changed: boolean;
  /** 1-based line numbers where the signature guard fell back */
  sigFailLines: number[];
  stats: FormatStats;
}

/**
 * Output of formatting one chunk
 */
export interface ChunkOutput {
  lines: string[];
  sigFailLines: number[];
  counts: StatCounts;
}

export function emptyCounts(): StatCounts {
  return {
    cmdValueAligned: 0,
    specialTwoQuoteAligned: 0,
    cmdNoRest: 0,
    echoTableAligned: 0,
    commentAligned: 0
  };
}

export function incrementCount(counts: StatCounts, counter: StatCounter): StatCounts {
  const next = { ...counts };
  next[counter] += 1;
  return next;
}

export function mergeCounts(a: StatCounts, b: StatCounts): StatCounts {
  return {
    cmdValueAligned: a.cmdValueAligned + b.cmdValueAligned,
    specialTwoQuoteAligned: a.specialTwoQuoteAligned + b.specialTwoQuoteAligned,
    cmdNoRest: a.cmdNoRest + b.cmdNoRest,
    echoTableAligned: a.echoTableAligned + b.echoTableAligned,
    commentAligned: a.commentAligned + b.commentAligned
  };
}
