/**
 * Token Display
 * Canonical spelling of each kind and one-line token rendering
 */

import type { Token, TokenKind } from '../types.js';
import { TOKEN_KINDS } from '../types.js';

export const KIND_DISPLAY: Readonly<Record<TokenKind, string>> = Object.freeze({
  [TOKEN_KINDS.INVALID]: '<Invalid>',
  [TOKEN_KINDS.IDENTIFIER]: '<Identifier>',
  [TOKEN_KINDS.END_OF_INPUT]: '<End-Of-Input>',
  [TOKEN_KINDS.ASSIGN]: '=',
  [TOKEN_KINDS.MULTIPLY]: '*',
  [TOKEN_KINDS.DIVIDE]: '/',
  [TOKEN_KINDS.PLUS]: '+',
  [TOKEN_KINDS.MINUS]: '-',
  [TOKEN_KINDS.GREATER]: '>',
  [TOKEN_KINDS.GREATER_EQUAL]: '>=',
  [TOKEN_KINDS.EQUAL]: '==',
  [TOKEN_KINDS.LESSER_EQUAL]: '<=',
  [TOKEN_KINDS.LESSER]: '<',
  [TOKEN_KINDS.BRACE_OPEN]: '{',
  [TOKEN_KINDS.BRACE_CLOSE]: '}',
  [TOKEN_KINDS.PAREN_OPEN]: '(',
  [TOKEN_KINDS.PAREN_CLOSE]: ')',
  [TOKEN_KINDS.COMMA]: ',',
  [TOKEN_KINDS.COLON]: ':',
  [TOKEN_KINDS.SEMI_COLON]: ';',
  [TOKEN_KINDS.INTEGER_LITERAL]: '<Integer Literal>',
  [TOKEN_KINDS.FLOAT_LITERAL]: '<Float Literal>',
  [TOKEN_KINDS.STRING_LITERAL]: '<String Literal>',
  [TOKEN_KINDS.INT]: 'int',
  [TOKEN_KINDS.DOUBLE]: 'double',
  [TOKEN_KINDS.STRING]: 'string',
  [TOKEN_KINDS.FUNCTION]: 'function',
  [TOKEN_KINDS.RETURN]: 'return',
  [TOKEN_KINDS.IF]: 'if',
  [TOKEN_KINDS.ELSE]: 'else',
  [TOKEN_KINDS.FOR]: 'for',
  [TOKEN_KINDS.CONTINUE]: 'continue',
  [TOKEN_KINDS.BREAK]: 'break',
});

export interface FormatTokenOptions {
  /** Append the token's offsets as ` @start..end` */
  offsets?: boolean;
}

/**
 * Render a token as `<display> : <text>`.
 *
 * @example formatToken(token) // '<Identifier> : rad'
 */
export function formatToken(
  token: Token,
  options: FormatTokenOptions = {}
): string {
  const line = `${KIND_DISPLAY[token.kind]} : ${token.text}`;
  if (!options.offsets) return line;
  return `${line} @${token.span.start}..${token.span.end}`;
}
