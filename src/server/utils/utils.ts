/**
 * Utility functions shared by the CLI and the language server
 */

import * as path from 'path';

/**
 * Path of `filePath` relative to `root`, with forward slashes
 */
export function toPosixRelative(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join('/');
}

/**
 * Extract error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return 'Unknown error';
  }
}
