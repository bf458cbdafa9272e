/**
 * File discovery: collect *.cfg files under a root and apply exclude globs
 */

import * as fs from 'fs';
import * as path from 'path';
import { CFG_SUFFIX, DEFAULT_EXCLUDES } from '../server/utils/constants';
import { logger } from '../server/utils/logger';
import { getErrorMessage, toPosixRelative } from '../server/utils/utils';

export interface DiscoverOptions {
  recursive: boolean;
  excludes: readonly string[];
}

export const DEFAULT_DISCOVER_OPTIONS: DiscoverOptions = {
  recursive: true,
  excludes: DEFAULT_EXCLUDES
};

/**
 * Convert a shell-style pattern to a regular expression.
 * `*` matches any run of characters and `?` any single character, both
 * including `/`; `[abc]` and `[!abc]` are character classes.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i] ?? '';
    i++;
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const close = pattern.indexOf(']', pattern[i] === '!' ? i + 2 : i + 1);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i, close).replace(/\\/g, '\\\\');
      if (body.startsWith('!')) {
        body = `^${body.slice(1)}`;
      } else if (body.startsWith('^')) {
        body = `\\${body}`;
      }
      source += `[${body}]`;
      i = close + 1;
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 's');
}

/**
 * Whether a root-relative POSIX path matches any exclude pattern. Each
 * pattern is tried against the path, against `/` + path, and with its
 * leading `.` and `/` characters removed.
 */
export function isExcluded(relativePath: string, patterns: readonly string[]): boolean {
  for (const raw of patterns) {
    const pattern = raw.trim();
    if (!pattern) {
      continue;
    }
    if (
      globToRegExp(pattern).test(relativePath) ||
      globToRegExp(pattern).test(`/${relativePath}`) ||
      globToRegExp(pattern.replace(/^[./]+/, '')).test(relativePath)
    ) {
      return true;
    }
  }
  return false;
}

/**
 * Flatten repeated and comma-separated `--exclude` values
 */
export function splitExcludes(values: readonly string[] | undefined): string[] {
  if (!values) {
    return [];
  }
  return values.flatMap(value => value.split(',').map(part => part.trim())).filter(part => part.length > 0);
}

function isRegularFile(entry: fs.Dirent, fullPath: string): boolean {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    return fs.statSync(fullPath).isFile();
  } catch (error) {
    logger.verbose(`Skipping broken link during discovery: ${fullPath}`, getErrorMessage(error));
    return false;
  }
}

function walk(dir: string, recursive: boolean, files: string[]): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    logger.verbose(`Failed to read directory during discovery: ${dir}`, getErrorMessage(error));
    return;
  }
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) {
        walk(fullPath, recursive, files);
      }
    } else if (entry.name.endsWith(CFG_SUFFIX) && isRegularFile(entry, fullPath)) {
      files.push(fullPath);
    }
  }
}

/**
 * Find cfg files under `root`, excluding matches, sorted by path
 */
export function collectCfgFiles(root: string, options: DiscoverOptions = DEFAULT_DISCOVER_OPTIONS): string[] {
  const resolvedRoot = path.resolve(root);
  const found: string[] = [];
  walk(resolvedRoot, options.recursive, found);

  const files = found.filter(file => {
    const excluded = isExcluded(toPosixRelative(resolvedRoot, file), options.excludes);
    if (excluded) {
      logger.verbose(`Excluded: ${file}`);
    }
    return !excluded;
  });
  return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
