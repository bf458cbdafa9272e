/**
 * Tests for alignment calculation
 */

import {
  calculateAlignment,
  calculateCommentColumn,
  isEchoTableCandidate,
  parseEchoRow,
  splitTwoQuoted
} from '../alignment';
import { commandRecord, commandRecords, defaultOptions } from './testUtils';

describe('Alignment', () => {
  describe('splitTwoQuoted', () => {
    it('should split two quoted strings', () => {
      expect(splitTwoQuoted('"w" "+forward"')).toEqual({ first: '"w"', second: '"+forward"', tail: '' });
    });

    it('should allow adjacent quotes and keep the tail', () => {
      expect(splitTwoQuoted('"a""b" extra')).toEqual({ first: '"a"', second: '"b"', tail: ' extra' });
    });

    it('should return null unless both strings are complete', () => {
      expect(splitTwoQuoted('"w" +forward')).toBeNull();
      expect(splitTwoQuoted('"unterminated')).toBeNull();
      expect(splitTwoQuoted('+forward "w"')).toBeNull();
    });
  });

  describe('isEchoTableCandidate', () => {
    const candidate = (line: string, options = defaultOptions) => isEchoTableCandidate(commandRecord(line), options);

    it('should accept rows with words and pipes', () => {
      expect(candidate('echo a|bb|ccc')).toBe(true);
      expect(candidate('echo 中|文')).toBe(true);
    });

    it('should accept many pipes without words', () => {
      expect(candidate('echo -|-|-|-|-')).toBe(true);
    });

    it('should reject lines without a pipe', () => {
      expect(candidate('echo abc')).toBe(false);
    });

    it('should reject ASCII art', () => {
      expect(candidate('echo ~~~|~~~')).toBe(false);
      expect(candidate('echo --|--|--')).toBe(false);
      expect(candidate('echo __|__ x')).toBe(false);
      expect(candidate('echo 【菜单】*|x')).toBe(false);
    });

    it('should reject lines with a trailing comment', () => {
      expect(candidate('echo a|b // c')).toBe(false);
    });

    it('should reject other keys', () => {
      expect(candidate('say a|b')).toBe(false);
    });

    it('should reject everything when table alignment is off', () => {
      expect(candidate('echo a|bb|ccc', { ...defaultOptions, echoAlignTables: false })).toBe(false);
    });
  });

  describe('parseEchoRow', () => {
    it('should detect framing pipes', () => {
      expect(parseEchoRow('| a | b |')).toEqual({ fields: ['a', 'b'], leadingPipe: true, trailingPipe: true });
      expect(parseEchoRow(' | a | b')).toEqual({ fields: ['a', 'b'], leadingPipe: true, trailingPipe: false });
    });

    it('should trim unframed fields', () => {
      expect(parseEchoRow(' x|y ')).toEqual({ fields: ['x', 'y'], leadingPipe: false, trailingPipe: false });
    });
  });

  describe('calculateAlignment', () => {
    const commands = commandRecords([
      'bind "w" "+forward"',
      'alias "jump" "+jump;-jump"',
      'sensitivity 2.5',
      'toggleconsole'
    ]);

    it('should place values one column past the widest key with a value', () => {
      const params = calculateAlignment(commands, defaultOptions);
      expect(params.maxKeyWidth).toBe(11);
      expect(params.valueColumn).toBe(12);
    });

    it('should place the second quoted argument after the widest first one', () => {
      const params = calculateAlignment(commands, defaultOptions);
      expect(params.maxFirstQuoteLength).toBe(6);
      expect(params.secondColumn).toBe(19);
    });

    it('should clamp the key width to the key cap', () => {
      const params = calculateAlignment(commands, { ...defaultOptions, keyCap: 8 });
      expect(params.maxKeyWidth).toBe(8);
      expect(params.valueColumn).toBe(9);
      expect(params.secondColumn).toBe(16);
    });

    it('should count indentation in the key width', () => {
      const params = calculateAlignment(commandRecords(['  bind "w" "+forward"']), defaultOptions);
      expect(params.maxKeyWidth).toBe(6);
    });

    it('should handle chunks without values', () => {
      const params = calculateAlignment(commandRecords(['toggleconsole']), defaultOptions);
      expect(params.maxKeyWidth).toBe(0);
      expect(params.valueColumn).toBe(1);
      expect(params.secondColumn).toBe(2);
    });

    it('should compute echo column widths from unframed rows only', () => {
      const params = calculateAlignment(
        commandRecords(['echo a|bb|ccc', 'echo dddd|e', 'echo | wide-framed-cell | y |']),
        defaultOptions
      );
      expect(params.echoColumnWidths).toEqual([4, 2, 3]);
      expect(params.echoRows.size).toBe(3);
      expect(params.echoRows.get(3)).toEqual({
        fields: ['wide-framed-cell', 'y'],
        leadingPipe: true,
        trailingPipe: true
      });
    });

    it('should measure echo cells by display width', () => {
      const params = calculateAlignment(commandRecords(['echo 中文|x']), defaultOptions);
      expect(params.echoColumnWidths).toEqual([4, 1]);
    });
  });

  describe('calculateCommentColumn', () => {
    it('should return null without commented lines', () => {
      expect(calculateCommentColumn([], 90)).toBeNull();
    });

    it('should use the longest code length up to the cap', () => {
      expect(calculateCommentColumn([10, 25], 90)).toBe(25);
      expect(calculateCommentColumn([10, 25], 20)).toBe(20);
    });
  });
});
