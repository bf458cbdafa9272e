/**
 * Tests for command-line parsing
 */

import * as fs from 'fs';
import { runCli, VERSION } from '../program';
import { captureOutput, makeTempDir, removeTempDir, writeFile } from './testUtils';

describe('CLI', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('should print the version', async () => {
    const captured = captureOutput();
    expect(await runCli(['--version'], captured.output)).toBe(0);
    expect(captured.stdout).toEqual([VERSION]);
  });

  it('should print help with examples', async () => {
    const captured = captureOutput();
    expect(await runCli(['format', '--help'], captured.output)).toBe(0);
    const help = captured.stdout.join('\n');
    expect(help).toContain('--check');
    expect(help).toContain('Examples:');
  });

  it('should fail with a hint when the directory is missing', async () => {
    const captured = captureOutput();
    expect(await runCli(['format'], captured.output)).toBe(2);
    expect(captured.stderr).toEqual([
      "error: missing required argument 'dir'\nhint: run `cfgfmt format --help` for usage."
    ]);
  });

  it('should fail without a command', async () => {
    expect(await runCli([], captureOutput().output)).toBe(2);
  });

  it('should reject an unknown align mode', async () => {
    const captured = captureOutput();
    expect(await runCli(['format', root, '--align', 'diagonal'], captured.output)).toBe(2);
    expect(captured.stderr[0]).toContain("argument 'diagonal' is invalid");
  });

  it('should reject a non-numeric tab width', async () => {
    expect(await runCli(['format', root, '--tab-width', 'wide'], captureOutput().output)).toBe(2);
  });

  it('should reject quiet together with verbose', async () => {
    expect(await runCli(['format', root, '-q', '-v'], captureOutput().output)).toBe(2);
  });

  it('should reject an unsupported encoding', async () => {
    const captured = captureOutput();
    expect(await runCli(['format', root, '--encoding', 'gbk'], captured.output)).toBe(2);
    expect(captured.stderr).toEqual([
      'error: Unsupported encoding "gbk" (supported: utf-8, utf8, utf-16le, utf16le, latin1)'
    ]);
  });

  it('should exit 1 from check mode when files would change', async () => {
    const file = writeFile(root, 'binds.cfg', 'bind "w"  "+forward"\n');
    const captured = captureOutput();
    expect(await runCli(['format', root, '--check'], captured.output)).toBe(1);
    expect(captured.stdout[captured.stdout.length - 1]).toBe('Summary: changed=0 ok=0 would-change=1 failed=0');
    expect(fs.readFileSync(file, 'utf8')).toBe('bind "w"  "+forward"\n');
  });

  it('should treat --dry-run like --check', async () => {
    writeFile(root, 'binds.cfg', 'bind "w"  "+forward"\n');
    expect(await runCli(['format', root, '--dry-run'], captureOutput().output)).toBe(1);
  });

  it('should pass format flags through', async () => {
    const file = writeFile(root, 'a.cfg', 'sv_cheats 1\nname player\n');
    const captured = captureOutput();
    expect(await runCli(['format', root, '--no-backup', '--key-cap', '3'], captured.output)).toBe(0);
    expect(captured.stdout).toEqual([`ok           ${file}`, 'Summary: changed=0 ok=1 would-change=0 failed=0']);
  });

  it('should write changes without a backup', async () => {
    const file = writeFile(root, 'a.cfg', '\tsv_cheats 1\n');
    expect(await runCli(['format', root, '--no-backup', '--tab-width', '2'], captureOutput().output)).toBe(0);
    expect(fs.readFileSync(file, 'utf8')).toBe('  sv_cheats 1\n');
    expect(fs.readdirSync(root)).toEqual(['a.cfg']);
  });
});
