/**
 * Constants for the cfg formatter
 * Centralized location for defaults and tool-level configuration values
 */

/**
 * Keys whose first two quoted arguments are aligned as two columns
 */
export const DEFAULT_SPECIAL_ALIGN_KEYS: ReadonlySet<string> = new Set(['bind', 'alias']);

/**
 * Default formatting configuration values
 */
export const DEFAULT_CONFIG = {
  /** Alignment scope */
  ALIGN_MODE: 'global',
  /** Spaces substituted for each TAB */
  TAB_WIDTH: 4,
  /** Maximum value column */
  KEY_CAP: 40,
  /** Maximum comment column */
  COMMENT_CAP: 90,
  /** Align pipe-delimited echo tables */
  ECHO_ALIGN_TABLES: true,
  /** Encoding used to read and write files */
  ENCODING: 'utf-8'
} as const;

/**
 * File suffix handled by the CLI
 */
export const CFG_SUFFIX = '.cfg';

/**
 * Exclude globs applied during discovery: VCS metadata and the backup,
 * temporary and old-version copies this tool or users leave behind
 */
export const DEFAULT_EXCLUDES: readonly string[] = [
  '**/.git/**',
  '**/*.bak*.cfg',
  '**/*.tmp*.cfg',
  '**/*.old*.cfg',
  '**/*_out.cfg'
];

/**
 * Text encodings accepted for reading and writing
 */
export const SUPPORTED_ENCODINGS = {
  'utf-8': 'utf-8',
  utf8: 'utf-8',
  'utf-16le': 'utf-16le',
  utf16le: 'utf-16le',
  latin1: 'latin1'
} as const;

export type SupportedEncoding = (typeof SUPPORTED_ENCODINGS)[keyof typeof SUPPORTED_ENCODINGS];

/**
 * Process exit codes of the CLI
 */
export const EXIT_CODES = {
  /** Nothing to do, or every change written */
  SUCCESS: 0,
  /** Check mode found files that would change */
  CHANGES_PENDING: 1,
  /** A file failed, or the invocation itself was invalid */
  FAILURE: 2
} as const;

/**
 * Number of signature-failure line numbers shown per file before summarizing
 */
export const MAX_REPORTED_FAIL_LINES = 10;

/**
 * LSP configuration section
 */
export const SETTINGS_SECTION = 'cfgfmt';
