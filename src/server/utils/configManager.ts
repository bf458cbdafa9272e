/**
 * Configuration Manager
 * Resolves formatter options from CLI flags or LSP settings
 */

import { ALIGN_MODES, AlignMode, FormatOptions } from '../providers/formatter/types';
import type { CfgFormatter } from '../providers/formatter';
import { DEFAULT_CONFIG, DEFAULT_SPECIAL_ALIGN_KEYS, SUPPORTED_ENCODINGS, SupportedEncoding } from './constants';
import { ConfigurationError } from './errors';
import { logger, LogLevel } from './logger';
import { defaultSettings, Settings } from './types';
import { getErrorMessage } from './utils';

/**
 * Map string log level to LogLevel enum
 */
export const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  verbose: LogLevel.VERBOSE
};

/**
 * Unvalidated option values, e.g. straight from a command line or a client
 */
export interface FormatOptionsInput {
  alignMode?: string;
  tabWidth?: number;
  keyCap?: number;
  commentCap?: number;
  specialAlignKeys?: Iterable<string>;
  echoAlignTables?: boolean;
}

export function isAlignMode(value: string): value is AlignMode {
  return ALIGN_MODES.some(mode => mode === value);
}

function requireNonNegativeInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

/**
 * Validate option values and fill in defaults. The result is frozen.
 * @throws ConfigurationError for an unknown align mode or an invalid width
 */
export function resolveFormatOptions(input: FormatOptionsInput = {}): FormatOptions {
  const alignMode = input.alignMode ?? DEFAULT_CONFIG.ALIGN_MODE;
  if (!isAlignMode(alignMode)) {
    throw new ConfigurationError(`Align mode must be one of ${ALIGN_MODES.join(', ')}, got "${alignMode}"`);
  }

  const specialAlignKeys = input.specialAlignKeys
    ? new Set(Array.from(input.specialAlignKeys, key => key.toLowerCase()))
    : DEFAULT_SPECIAL_ALIGN_KEYS;

  return Object.freeze({
    alignMode,
    tabWidth: requireNonNegativeInteger('Tab width', input.tabWidth ?? DEFAULT_CONFIG.TAB_WIDTH),
    keyCap: requireNonNegativeInteger('Key cap', input.keyCap ?? DEFAULT_CONFIG.KEY_CAP),
    commentCap: requireNonNegativeInteger('Comment cap', input.commentCap ?? DEFAULT_CONFIG.COMMENT_CAP),
    specialAlignKeys,
    echoAlignTables: input.echoAlignTables ?? DEFAULT_CONFIG.ECHO_ALIGN_TABLES
  });
}

/**
 * Map an encoding name to a supported encoding
 * @throws ConfigurationError for anything else
 */
export function resolveEncoding(name: string): SupportedEncoding {
  const key = name.trim().toLowerCase();
  for (const [alias, encoding] of Object.entries(SUPPORTED_ENCODINGS)) {
    if (alias === key) {
      return encoding;
    }
  }
  throw new ConfigurationError(
    `Unsupported encoding "${name}" (supported: ${Object.keys(SUPPORTED_ENCODINGS).join(', ')})`
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick<T>(value: unknown, guard: (candidate: unknown) => candidate is T, fallback: T): T {
  return guard(value) ? value : fallback;
}

const isString = (value: unknown): value is string => typeof value === 'string';
const isNumber = (value: unknown): value is number => typeof value === 'number';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(item => typeof item === 'string');

/**
 * Merge the `cfgfmt` section sent by a client over the defaults.
 * Accepts the section itself or an object wrapping it.
 */
export function mergeSettings(raw: unknown): Settings {
  const section = isRecord(raw) && isRecord(raw.cfgfmt) ? raw.cfgfmt : raw;
  if (!isRecord(section)) {
    return defaultSettings;
  }
  const defaults = defaultSettings.cfgfmt;
  const formatter: Record<string, unknown> = isRecord(section.formatter) ? section.formatter : {};

  return {
    cfgfmt: {
      formatter: {
        enabled: pick(formatter.enabled, isBoolean, defaults.formatter.enabled),
        alignMode: pick(formatter.alignMode, isString, defaults.formatter.alignMode),
        tabWidth: pick(formatter.tabWidth, isNumber, defaults.formatter.tabWidth),
        keyCap: pick(formatter.keyCap, isNumber, defaults.formatter.keyCap),
        commentCap: pick(formatter.commentCap, isNumber, defaults.formatter.commentCap),
        echoAlignTables: pick(formatter.echoAlignTables, isBoolean, defaults.formatter.echoAlignTables),
        specialAlignKeys: pick(formatter.specialAlignKeys, isStringArray, defaults.formatter.specialAlignKeys)
      },
      logLevel: pick(section.logLevel, isString, defaults.logLevel),
      verboseLogging: pick(section.verboseLogging, isBoolean, defaults.verboseLogging)
    }
  };
}

/**
 * Apply settings to the logger and the formatter. Invalid formatter options
 * are logged and the formatter keeps its previous options.
 * @returns true when the formatter options were updated
 */
export function updateFormatterWithSettings(settings: Settings, formatter: CfgFormatter): boolean {
  const config = settings.cfgfmt;

  const level = LOG_LEVEL_MAP[config.logLevel.toLowerCase()];
  if (level !== undefined) {
    logger.setLevel(level);
  } else {
    logger.warn(`Unknown log level "${config.logLevel}", keeping current level`);
  }
  logger.setVerboseLogging(config.verboseLogging);

  try {
    const options = resolveFormatOptions(config.formatter);
    formatter.updateOptions(options);
    logger.info(
      `Formatter settings updated: alignMode=${options.alignMode}, tabWidth=${options.tabWidth}, keyCap=${options.keyCap}, commentCap=${options.commentCap}, echoAlignTables=${options.echoAlignTables}`
    );
    return true;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Invalid formatter settings, keeping previous options: ${getErrorMessage(error)}`);
      return false;
    }
    throw error;
  }
}
