/**
 * Formatter module exports
 *
 * - Types and options
 * - Line classification and block boundaries
 * - Alignment calculation
 * - Line rendering and the signature guard
 * - The document driver
 */

export * from './types';
export * from './boundary';
export * from './classifier';
export * from './alignment';
export * from './lineFormatting';
export * from './signature';
export * from './format';
