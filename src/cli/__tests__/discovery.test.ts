/**
 * Tests for cfg file discovery
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_EXCLUDES } from '../../server/utils/constants';
import { collectCfgFiles, globToRegExp, isExcluded, splitExcludes } from '../discovery';
import { makeTempDir, removeTempDir, writeFile } from './testUtils';

describe('Discovery', () => {
  describe('globToRegExp', () => {
    it('should require the literal slash after **', () => {
      const regex = globToRegExp('**/*.bak*.cfg');
      expect(regex.test('a/b/x.bak.1.cfg')).toBe(true);
      expect(regex.test('/x.bak.1.cfg')).toBe(true);
      expect(regex.test('x.bak.1.cfg')).toBe(false);
    });

    it('should let * cross directories', () => {
      const regex = globToRegExp('*.cfg');
      expect(regex.test('autoexec.cfg')).toBe(true);
      expect(regex.test('sub/autoexec.cfg')).toBe(true);
      expect(regex.test('autoexec.txt')).toBe(false);
    });

    it('should support character classes', () => {
      expect(globToRegExp('cfg[0-9].cfg').test('cfg7.cfg')).toBe(true);
      expect(globToRegExp('cfg[0-9].cfg').test('cfgx.cfg')).toBe(false);
      expect(globToRegExp('cfg[!0-9].cfg').test('cfgx.cfg')).toBe(true);
      expect(globToRegExp('cfg[!0-9].cfg').test('cfg7.cfg')).toBe(false);
      expect(globToRegExp('cfg[.cfg').test('cfg[.cfg')).toBe(true);
    });

    it('should match single characters with ?', () => {
      expect(globToRegExp('cfg?.cfg').test('cfg1.cfg')).toBe(true);
      expect(globToRegExp('cfg?.cfg').test('cfg12.cfg')).toBe(false);
    });

    it('should escape regular expression characters', () => {
      expect(globToRegExp('a+b.cfg').test('a+b.cfg')).toBe(true);
      expect(globToRegExp('a+b.cfg').test('aab.cfg')).toBe(false);
    });
  });

  describe('isExcluded', () => {
    it('should apply the default excludes', () => {
      expect(isExcluded('.git/hooks/x.cfg', DEFAULT_EXCLUDES)).toBe(true);
      expect(isExcluded('sub/game.old.cfg', DEFAULT_EXCLUDES)).toBe(true);
      expect(isExcluded('render_out.cfg', DEFAULT_EXCLUDES)).toBe(true);
      expect(isExcluded('autoexec.cfg', DEFAULT_EXCLUDES)).toBe(false);
    });

    it('should ignore a leading ./ and blank patterns', () => {
      expect(isExcluded('sub/autoexec.cfg', ['./sub/*.cfg'])).toBe(true);
      expect(isExcluded('sub/autoexec.cfg', ['../sub/*.cfg'])).toBe(true);
      expect(isExcluded('autoexec.cfg', ['  '])).toBe(false);
    });

    it('should match patterns across directory levels', () => {
      expect(isExcluded('sub/deep/x.cfg', ['sub/*.cfg'])).toBe(true);
      expect(isExcluded('sub/autoexec.cfg', ['*autoexec.cfg'])).toBe(true);
      expect(isExcluded('a/b.bak.x/c.cfg', DEFAULT_EXCLUDES)).toBe(true);
      expect(isExcluded('other/x.cfg', ['sub/*.cfg'])).toBe(false);
    });

    it('should be case-sensitive', () => {
      expect(isExcluded('Render_OUT.cfg', DEFAULT_EXCLUDES)).toBe(false);
    });
  });

  describe('splitExcludes', () => {
    it('should flatten comma-separated and repeated values', () => {
      expect(splitExcludes(['a, b', ' ,c'])).toEqual(['a', 'b', 'c']);
      expect(splitExcludes(undefined)).toEqual([]);
    });
  });

  describe('collectCfgFiles', () => {
    let root: string;

    beforeEach(() => {
      root = makeTempDir();
      writeFile(root, 'b.cfg', 'b 1\n');
      writeFile(root, 'a.cfg', 'a 1\n');
      writeFile(root, 'notes.txt', 'x\n');
      writeFile(root, 'sub/c.cfg', 'c 1\n');
      writeFile(root, 'sub/c.bak.20260101-000000.cfg', 'c 1\n');
      writeFile(root, '.git/x.cfg', 'x 1\n');
    });

    afterEach(() => {
      removeTempDir(root);
    });

    it('should find cfg files recursively in sorted order', () => {
      expect(collectCfgFiles(root)).toEqual([
        path.join(root, 'a.cfg'),
        path.join(root, 'b.cfg'),
        path.join(root, 'sub', 'c.cfg')
      ]);
    });

    it('should stay in the top-level directory when not recursive', () => {
      expect(collectCfgFiles(root, { recursive: false, excludes: DEFAULT_EXCLUDES })).toEqual([
        path.join(root, 'a.cfg'),
        path.join(root, 'b.cfg')
      ]);
    });

    it('should apply extra excludes', () => {
      expect(collectCfgFiles(root, { recursive: true, excludes: [...DEFAULT_EXCLUDES, 'sub/**', 'b.cfg'] })).toEqual([
        path.join(root, 'a.cfg')
      ]);
    });

    it('should include symlinked cfg files', () => {
      const target = writeFile(root, 'targets/real.txt', 'd 1\n');
      fs.symlinkSync(target, path.join(root, 'link.cfg'));
      fs.symlinkSync(path.join(root, 'missing.txt'), path.join(root, 'broken.cfg'));

      expect(collectCfgFiles(root, { recursive: false, excludes: DEFAULT_EXCLUDES })).toEqual([
        path.join(root, 'a.cfg'),
        path.join(root, 'b.cfg'),
        path.join(root, 'link.cfg')
      ]);
    });
  });
});
