/**
 * LSP Handlers
 * Centralized exports for LSP request handlers
 */

export { handleDocumentFormatting } from './formattingHandler';
