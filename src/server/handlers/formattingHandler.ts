/**
 * Formatting Handler
 * Handles document formatting requests
 */

import type { DocumentFormattingParams, TextEdit, TextDocuments } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import type { CfgFormatter } from '../providers/formatter';
import type { Settings } from '../utils/types';

/**
 * Handle document formatting request
 */
export function handleDocumentFormatting(
  params: DocumentFormattingParams,
  documents: TextDocuments<TextDocument>,
  formatterProvider: CfgFormatter,
  settings: Settings
): TextEdit[] {
  if (!settings.cfgfmt.formatter.enabled) {
    return [];
  }

  const document = documents.get(params.textDocument.uri);
  if (!document) {
    return [];
  }

  return formatterProvider.formatDocument(document.getText(), params.textDocument.uri);
}
