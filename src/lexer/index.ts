/**
 * Lexer Module
 */

export {
  Scanner,
  tokenize,
  type ScannerCallbacks,
  type ScannerOptions,
} from './tokenizer.js';
export { decodeStringLiteral } from './readers.js';
export { isKeywordKind, KEYWORDS } from './operators.js';
export { formatToken, KIND_DISPLAY, type FormatTokenOptions } from './display.js';
