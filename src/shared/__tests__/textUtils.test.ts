/**
 * Tests for shared text utilities
 */

import {
  splitLines,
  detectNewline,
  detab,
  rstripWhitespace,
  normalizeLine,
  signature,
  textLength,
  getIndentation,
  visualWidth
} from '../textUtils';

describe('textUtils', () => {
  describe('splitLines', () => {
    it('should split LF and CRLF text without a trailing empty line', () => {
      expect(splitLines('a\r\nb\n')).toEqual(['a', 'b']);
      expect(splitLines('a\nb')).toEqual(['a', 'b']);
    });

    it('should keep blank lines before the final newline', () => {
      expect(splitLines('a\n\n')).toEqual(['a', '']);
      expect(splitLines('\n')).toEqual(['']);
    });

    it('should return no lines for empty text', () => {
      expect(splitLines('')).toEqual([]);
    });
  });

  describe('detectNewline', () => {
    it('should prefer CRLF when any is present', () => {
      expect(detectNewline('a\r\nb\n')).toBe('\r\n');
      expect(detectNewline('a\nb\n')).toBe('\n');
      expect(detectNewline('')).toBe('\n');
    });
  });

  describe('normalization', () => {
    it('should replace every TAB with a fixed number of spaces', () => {
      expect(detab('\tbind\t"w"', 2)).toBe('  bind  "w"');
      expect(detab('\tx', 0)).toBe('x');
    });

    it('should strip trailing layout whitespace only', () => {
      expect(rstripWhitespace('abc \t\r\f\v')).toBe('abc');
      expect(rstripWhitespace('  abc')).toBe('  abc');
    });

    it('should detab before stripping', () => {
      expect(normalizeLine('\tx\t', 4)).toBe('    x');
    });
  });

  describe('signature', () => {
    it('should drop spaces, TABs and CR/FF/VT', () => {
      expect(signature(' bind  "w"\t"+f" \r')).toBe('bind"w""+f"');
    });

    it('should keep non-breaking spaces', () => {
      expect(signature('a\u00a0b c')).toBe('a\u00a0bc');
    });
  });

  describe('textLength', () => {
    it('should count code points', () => {
      expect(textLength('abc')).toBe(3);
      expect(textLength('a\u{1F600}')).toBe(2);
    });
  });

  describe('getIndentation', () => {
    it('should return the leading whitespace', () => {
      expect(getIndentation('   key value')).toBe('   ');
      expect(getIndentation('key')).toBe('');
    });
  });

  describe('visualWidth', () => {
    it('should count ASCII as 1 per character', () => {
      expect(visualWidth('abc')).toBe(3);
    });

    it('should count CJK and fullwidth characters as 2', () => {
      expect(visualWidth('中文')).toBe(4);
      expect(visualWidth('ＡＢ')).toBe(4);
    });

    it('should count emoji and wide pictographs as 2', () => {
      for (const ch of ['\u{1F680}', '\u2705', '\u26a1', '\u2b50', '\u274c', '\u{1FAE0}', '\u231a']) {
        expect(visualWidth(ch)).toBe(2);
      }
    });

    it('should keep narrow symbols between the wide ones at 1', () => {
      expect(visualWidth('\u2606')).toBe(1);
      expect(visualWidth('\u2713')).toBe(1);
    });

    it('should count combining marks as 0', () => {
      expect(visualWidth('e\u0301')).toBe(1);
    });
  });
});
