/**
 * minilex Module
 * Exports the scanner, token tables, and error types
 */

export {
  decodeStringLiteral,
  formatToken,
  isKeywordKind,
  KEYWORDS,
  KIND_DISPLAY,
  Scanner,
  tokenize,
  type FormatTokenOptions,
  type ScannerCallbacks,
  type ScannerOptions,
} from './lexer/index.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  type LexConfig,
  type OutputFormat,
} from './config.js';

export * from './types.js';
