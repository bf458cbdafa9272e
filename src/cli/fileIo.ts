/**
 * File I/O for the CLI: strict decoding, timestamped backups and atomic replace
 */

import * as fs from 'fs';
import * as path from 'path';
import { TextDecoder } from 'util';
import type { SupportedEncoding } from '../server/utils/constants';

const BUFFER_ENCODINGS: Record<SupportedEncoding, BufferEncoding> = {
  'utf-8': 'utf8',
  'utf-16le': 'utf16le',
  latin1: 'latin1'
};

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD-HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}-${time}`;
}

/**
 * Sibling path `<stem><infix><ext>`; only the last extension is kept apart,
 * so `a.cfg.old.cfg` becomes `a.cfg.old<infix>.cfg`
 */
export function siblingPath(filePath: string, infix: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${infix}${parsed.ext}`);
}

/**
 * Decode a file without guessing: invalid byte sequences throw.
 * A byte order mark stays part of the text so it is written back unchanged.
 */
export function readTextStrict(filePath: string, encoding: SupportedEncoding): string {
  const bytes = fs.readFileSync(filePath);
  if (encoding === 'latin1') {
    return bytes.toString('latin1');
  }
  const decoder = new TextDecoder(encoding, { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new Error(`Cannot decode ${filePath} as ${encoding}`, { cause: error });
  }
}

function encodeStrict(text: string, encoding: SupportedEncoding): Buffer {
  if (encoding === 'latin1' && /[^\u0000-\u00ff]/.test(text)) {
    throw new Error('Text contains characters that cannot be encoded as latin1');
  }
  return Buffer.from(text, BUFFER_ENCODINGS[encoding]);
}

/**
 * Copy a file to `<stem>.bak.<timestamp><ext>` next to it, keeping its times
 * @returns The backup path
 */
export function backupFile(filePath: string, now: Date = new Date()): string {
  const backupPath = siblingPath(filePath, `.bak.${formatTimestamp(now)}`);
  fs.copyFileSync(filePath, backupPath);
  const stat = fs.statSync(filePath);
  fs.utimesSync(backupPath, stat.atime, stat.mtime);
  return backupPath;
}

/**
 * Replace a file's contents via a temporary sibling and a rename, so readers
 * never observe a partial file
 */
export function atomicWriteText(filePath: string, text: string, encoding: SupportedEncoding): void {
  const tmpPath = siblingPath(filePath, `.tmp.${process.pid}`);
  try {
    fs.writeFileSync(tmpPath, encodeStrict(text, encoding));
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    fs.rmSync(tmpPath, { force: true });
    throw error;
  }
}
