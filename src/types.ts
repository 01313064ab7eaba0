/**
 * minilex Types
 * Token kinds, token shape, and the error hierarchy
 */

// ============================================================
// SOURCE SPAN
// ============================================================

/** Half-open range of character offsets into the source text */
export interface SourceSpan {
  readonly start: number;
  readonly end: number;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const MINILEX_ERROR_CODES = {
  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_UNREADABLE: 'CONFIG_UNREADABLE',

  // CLI errors
  CLI_USAGE: 'CLI_USAGE',
  CLI_FILE_NOT_FOUND: 'CLI_FILE_NOT_FOUND',
} as const;

export type MinilexErrorCode =
  (typeof MINILEX_ERROR_CODES)[keyof typeof MINILEX_ERROR_CODES];

/** Structured error data for host applications */
export interface MinilexErrorData {
  readonly code: MinilexErrorCode;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all minilex errors.
 * The scanner never throws; these cover the surfaces around it.
 */
export class MinilexError extends Error {
  readonly code: MinilexErrorCode;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: MinilexErrorData) {
    super(data.message);
    this.name = 'MinilexError';
    this.code = data.code;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): MinilexErrorData {
    return {
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Configuration file errors */
export class ConfigError extends MinilexError {
  constructor(
    message: string,
    code: MinilexErrorCode = MINILEX_ERROR_CODES.CONFIG_INVALID,
    context?: Record<string, unknown>
  ) {
    super({ code, message: `Invalid configuration: ${message}`, context });
    this.name = 'ConfigError';
  }
}

/** Command-line usage errors */
export class UsageError extends MinilexError {
  constructor(
    message: string,
    code: MinilexErrorCode = MINILEX_ERROR_CODES.CLI_USAGE,
    context?: Record<string, unknown>
  ) {
    super({ code, message, context });
    this.name = 'UsageError';
  }
}

// ============================================================
// TOKEN KINDS
// ============================================================

export const TOKEN_KINDS = {
  // Special
  INVALID: 'Invalid',
  IDENTIFIER: 'Identifier',
  END_OF_INPUT: 'EndOfInput',

  // Operators
  ASSIGN: 'Assign', // =
  MULTIPLY: 'Multiply', // *
  DIVIDE: 'Divide', // /
  PLUS: 'Plus', // +
  MINUS: 'Minus', // -
  GREATER: 'Greater', // >
  GREATER_EQUAL: 'GreaterEqual', // >=
  EQUAL: 'Equal', // ==
  LESSER_EQUAL: 'LesserEqual', // <=
  LESSER: 'Lesser', // <

  // Punctuation
  BRACE_OPEN: 'BraceOpen', // {
  BRACE_CLOSE: 'BraceClose', // }
  PAREN_OPEN: 'ParenOpen', // (
  PAREN_CLOSE: 'ParenClose', // )
  COMMA: 'Comma', // ,
  COLON: 'Colon', // :
  SEMI_COLON: 'SemiColon', // ;

  // Literals
  INTEGER_LITERAL: 'IntegerLiteral', // 1, 23, 435
  FLOAT_LITERAL: 'FloatLiteral', // 1.5, 2e10
  STRING_LITERAL: 'StringLiteral', // "hello world!"

  // Keywords
  INT: 'Int',
  DOUBLE: 'Double',
  STRING: 'String',
  FUNCTION: 'Function',
  RETURN: 'Return',
  IF: 'If',
  ELSE: 'Else',
  FOR: 'For',
  CONTINUE: 'Continue',
  BREAK: 'Break',
} as const;

export type TokenKind = (typeof TOKEN_KINDS)[keyof typeof TOKEN_KINDS];

export type KeywordKind =
  | typeof TOKEN_KINDS.INT
  | typeof TOKEN_KINDS.DOUBLE
  | typeof TOKEN_KINDS.STRING
  | typeof TOKEN_KINDS.FUNCTION
  | typeof TOKEN_KINDS.RETURN
  | typeof TOKEN_KINDS.IF
  | typeof TOKEN_KINDS.ELSE
  | typeof TOKEN_KINDS.FOR
  | typeof TOKEN_KINDS.CONTINUE
  | typeof TOKEN_KINDS.BREAK;

export interface Token {
  readonly kind: TokenKind;
  /** Exact source slice; empty for EndOfInput */
  readonly text: string;
  readonly span: SourceSpan;
}
