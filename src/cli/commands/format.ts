import * as fs from 'fs';
import * as path from 'path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { ALIGN_MODES, FormatOptions, formatText } from '../../server/providers/formatter/index';
import { resolveEncoding, resolveFormatOptions } from '../../server/utils/configManager';
import {
  DEFAULT_CONFIG,
  DEFAULT_EXCLUDES,
  EXIT_CODES,
  MAX_REPORTED_FAIL_LINES,
  SupportedEncoding
} from '../../server/utils/constants';
import { ConfigurationError } from '../../server/utils/errors';
import { logger, LogLevel } from '../../server/utils/logger';
import { getErrorMessage } from '../../server/utils/utils';
import { collectCfgFiles, splitExcludes } from '../discovery';
import { atomicWriteText, backupFile, readTextStrict } from '../fileIo';
import type { CliOutput } from '../terminal';

export type FileStatus = 'ok' | 'changed' | 'would-change' | 'failed';

export interface FileResult {
  path: string;
  status: FileStatus;
  message?: string;
  sigFailLines?: number[];
}

export interface RunFormatOptions {
  recursive: boolean;
  check: boolean;
  failFast: boolean;
  excludes: readonly string[];
  backup: boolean;
  encoding: SupportedEncoding;
  quiet: boolean;
  verbose: boolean;
  format: FormatOptions;
}

/**
 * Raw option values as commander parses them
 */
interface FormatCommandFlags {
  recursive: boolean;
  check?: boolean;
  dryRun?: boolean;
  failFast?: boolean;
  exclude: string[];
  backup: boolean;
  encoding: string;
  quiet?: boolean;
  verbose?: boolean;
  align: string;
  tabWidth: number;
  keyCap: number;
  commentCap: number;
  echoTables: boolean;
}

const STATUS_LABELS: Record<FileStatus, string> = {
  ok: 'ok',
  changed: 'changed',
  'would-change': 'would change',
  failed: 'failed'
};

const LABEL_WIDTH = 13;

function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function collectValues(value: string, previous: string[]): string[] {
  return previous.concat(value);
}

export function describeSignatureFailure(lines: number[]): string {
  const shown = lines.slice(0, MAX_REPORTED_FAIL_LINES).join(',');
  const more = lines.length > MAX_REPORTED_FAIL_LINES ? ` (+${lines.length - MAX_REPORTED_FAIL_LINES})` : '';
  return `signature check failed on lines: ${shown}${more}`;
}

export function formatFileResult(result: FileResult): string {
  const line = `${STATUS_LABELS[result.status].padEnd(LABEL_WIDTH)}${result.path}`;
  return result.message ? `${line}  (${result.message})` : line;
}

function processFile(filePath: string, options: RunFormatOptions): FileResult {
  const raw = readTextStrict(filePath, options.encoding);
  const result = formatText(raw, options.format);
  logger.verbose(`Stats for ${filePath}`, result.stats);

  if (result.sigFailLines.length > 0) {
    return {
      path: filePath,
      status: 'failed',
      message: describeSignatureFailure(result.sigFailLines),
      sigFailLines: result.sigFailLines
    };
  }
  if (!result.changed) {
    return { path: filePath, status: 'ok' };
  }
  if (options.check) {
    return { path: filePath, status: 'would-change' };
  }

  if (options.backup) {
    const backupPath = backupFile(filePath);
    logger.verbose(`Backup written: ${backupPath}`);
  }
  atomicWriteText(filePath, result.text, options.encoding);
  return { path: filePath, status: 'changed' };
}

/**
 * Format every cfg file under `dir` and report per file
 * @returns The process exit code
 */
export function runFormat(dir: string, options: RunFormatOptions, output: CliOutput): number {
  const root = path.resolve(dir);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    output.stdout(formatFileResult({ path: dir, status: 'failed', message: 'not a directory' }));
    return EXIT_CODES.FAILURE;
  }

  const excludes = [...DEFAULT_EXCLUDES, ...options.excludes];
  const files = collectCfgFiles(root, { recursive: options.recursive, excludes });
  logger.verbose(
    `root=${root} recursive=${options.recursive} files=${files.length} encoding=${options.encoding} backup=${options.backup}`
  );

  const results: FileResult[] = [];
  for (const filePath of files) {
    let result: FileResult;
    try {
      result = processFile(filePath, options);
    } catch (error) {
      logger.debug(`Failed to format ${filePath}: ${getErrorMessage(error)}`);
      result = { path: filePath, status: 'failed', message: getErrorMessage(error) };
    }
    results.push(result);
    if (result.status === 'failed' && options.failFast) {
      break;
    }
  }

  for (const result of results) {
    if (options.quiet && result.status !== 'failed') {
      continue;
    }
    output.stdout(formatFileResult(result));
  }

  const count = (status: FileStatus): number => results.filter(result => result.status === status).length;
  output.stdout(
    `Summary: changed=${count('changed')} ok=${count('ok')} would-change=${count('would-change')} failed=${count('failed')}`
  );

  if (count('failed') > 0) {
    return EXIT_CODES.FAILURE;
  }
  if (options.check && count('would-change') > 0) {
    return EXIT_CODES.CHANGES_PENDING;
  }
  return EXIT_CODES.SUCCESS;
}

/**
 * Turn parsed flags into validated run options
 * @throws ConfigurationError for invalid format options or encoding
 */
export function resolveRunOptions(flags: FormatCommandFlags): RunFormatOptions {
  return {
    recursive: flags.recursive,
    check: Boolean(flags.check || flags.dryRun),
    failFast: Boolean(flags.failFast),
    excludes: splitExcludes(flags.exclude),
    backup: flags.backup,
    encoding: resolveEncoding(flags.encoding),
    quiet: Boolean(flags.quiet),
    verbose: Boolean(flags.verbose),
    format: resolveFormatOptions({
      alignMode: flags.align,
      tabWidth: flags.tabWidth,
      keyCap: flags.keyCap,
      commentCap: flags.commentCap,
      echoAlignTables: flags.echoTables
    })
  };
}

export function formatCommand(output: CliOutput, setExitCode: (code: number) => void): Command {
  return new Command('format')
    .description('Format the *.cfg files under a directory (whitespace and alignment only)')
    .argument('<dir>', 'root directory to scan')
    .option('--no-recursive', 'only process the top-level directory')
    .option('--check', 'report files that would change without writing; exit 1 if any')
    .option('--dry-run', 'same as --check')
    .option('--fail-fast', 'stop at the first failed file')
    .option('--exclude <globs>', 'exclude globs, comma-separated or repeated', collectValues, [])
    .option('--no-backup', 'do not write a timestamped backup before replacing a file')
    .option('--encoding <name>', 'encoding for reading and writing', DEFAULT_CONFIG.ENCODING)
    .addOption(new Option('-q, --quiet', 'only print failures and the summary').conflicts('verbose'))
    .addOption(new Option('-v, --verbose', 'print discovery details and per-file stats').conflicts('quiet'))
    .addOption(
      new Option('--align <mode>', 'alignment scope').choices([...ALIGN_MODES]).default(DEFAULT_CONFIG.ALIGN_MODE)
    )
    .option('--tab-width <n>', 'spaces per TAB', parseNonNegativeInteger, DEFAULT_CONFIG.TAB_WIDTH)
    .option('--key-cap <n>', 'maximum value column', parseNonNegativeInteger, DEFAULT_CONFIG.KEY_CAP)
    .option('--comment-cap <n>', 'maximum comment column', parseNonNegativeInteger, DEFAULT_CONFIG.COMMENT_CAP)
    .option('--no-echo-tables', 'do not align pipe-delimited echo tables')
    .addHelpText(
      'after',
      [
        '',
        'Examples:',
        '  cfgfmt format ./cfg',
        '  cfgfmt format ./cfg --check',
        '  cfgfmt format ./cfg --exclude "**/autoexec.cfg,**/run_async.cfg"',
        '  cfgfmt format ./cfg --align block --fail-fast'
      ].join('\n')
    )
    .action((dir: string, flags: FormatCommandFlags) => {
      let options: RunFormatOptions;
      try {
        options = resolveRunOptions(flags);
      } catch (error) {
        if (error instanceof ConfigurationError) {
          output.stderr(`error: ${error.message}`);
          setExitCode(EXIT_CODES.FAILURE);
          return;
        }
        throw error;
      }
      logger.setLevel(options.verbose ? LogLevel.VERBOSE : LogLevel.WARN);
      setExitCode(runFormat(dir, options, output));
    });
}
