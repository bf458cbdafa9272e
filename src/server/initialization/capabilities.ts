/**
 * Server capabilities configuration
 */

import type { InitializeResult } from 'vscode-languageserver/node';
import { TextDocumentSyncKind } from 'vscode-languageserver/node';

/**
 * Server capabilities returned during initialization
 */
export function getServerCapabilities(): InitializeResult {
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      documentFormattingProvider: true
    }
  };
}
