/**
 * Code Formatter for cfg scripts
 */

import { TextEdit, Range } from 'vscode-languageserver/node';
import { logger } from '../utils/logger';
import { resolveFormatOptions } from '../utils/configManager';
import { splitLines } from '../../shared/textUtils';
import { FormatOptions, FormatResult, formatText } from './formatter/index';

// Re-export types for consumers of the provider
export type { FormatOptions, FormatResult } from './formatter/types';

export class CfgFormatter {
  private options: FormatOptions;

  constructor(options: FormatOptions = resolveFormatOptions()) {
    this.options = options;
  }

  updateOptions(options: FormatOptions): void {
    this.options = options;
  }

  getOptions(): FormatOptions {
    return this.options;
  }

  format(text: string): FormatResult {
    return formatText(text, this.options);
  }

  /**
   * Whole-document edit, or no edits when nothing changes or when any line
   * failed the signature check
   */
  formatDocument(text: string, uri?: string): TextEdit[] {
    const result = this.format(text);

    if (result.sigFailLines.length > 0) {
      logger.warnWithContext(
        `Signature check failed on ${result.sigFailLines.length} line(s), document left unchanged`,
        { file: uri, line: result.sigFailLines[0], operation: 'formatDocument' }
      );
      return [];
    }
    if (!result.changed) {
      logger.verbose(`Document already formatted: ${uri ?? '<untitled>'}`);
      return [];
    }

    const lines = text.split('\n');
    const lastLine = lines[lines.length - 1] ?? '';
    logger.verbose(`Formatted ${splitLines(text).length} line(s): ${uri ?? '<untitled>'}`);
    return [TextEdit.replace(Range.create(0, 0, lines.length - 1, lastLine.length), result.text)];
  }
}
