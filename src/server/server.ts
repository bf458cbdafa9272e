/**
 * cfg Language Server
 * Exposes the whitespace formatter to editors over LSP
 */

import type {
  InitializeParams,
  InitializeResult,
  DocumentFormattingParams
} from 'vscode-languageserver/node';
import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  DidChangeConfigurationNotification
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';

import { logger, LogLevel } from './utils/logger';
import { SETTINGS_SECTION } from './utils/constants';
import type { Settings } from './utils/types';
import { defaultSettings } from './utils/types';
import { mergeSettings, updateFormatterWithSettings } from './utils/configManager';
import { CfgFormatter } from './providers/formatter';
import { handleDocumentFormatting } from './handlers';
import { getServerCapabilities } from './initialization';

// Create connection and document manager
const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

logger.initialize(connection, LogLevel.INFO, false);

// Crash logging
process.on('uncaughtException', err => {
  logger.errorWithContext('Uncaught exception', { error: err });
});

process.on('unhandledRejection', reason => {
  logger.errorWithContext('Unhandled rejection', { error: reason });
});

const formatter = new CfgFormatter();

let hasConfigurationCapability = false;
let globalSettings: Settings = defaultSettings;

async function refreshSettings(fallback: unknown): Promise<void> {
  let raw: unknown = fallback;
  if (hasConfigurationCapability) {
    try {
      raw = await connection.workspace.getConfiguration(SETTINGS_SECTION);
    } catch (e) {
      logger.errorWithContext('Failed to fetch configuration', { error: e, operation: 'getConfiguration' });
    }
  }
  globalSettings = mergeSettings(raw);
  updateFormatterWithSettings(globalSettings, formatter);
}

connection.onInitialize((params: InitializeParams): InitializeResult => {
  const capabilities = params.capabilities;
  hasConfigurationCapability = !!(capabilities.workspace && !!capabilities.workspace.configuration);
  return getServerCapabilities();
});

connection.onInitialized(async () => {
  if (hasConfigurationCapability) {
    await connection.client.register(DidChangeConfigurationNotification.type, undefined);
  }
  await refreshSettings(undefined);
});

connection.onDidChangeConfiguration(async (change: { settings: unknown }) => {
  await refreshSettings(change.settings);
});

connection.onExit(() => {
  logger.info('Language server process exiting');
});

// Formatting
connection.onDocumentFormatting((params: DocumentFormattingParams) => {
  return handleDocumentFormatting(params, documents, formatter, globalSettings);
});

// Start listening
documents.listen(connection);
connection.listen();
