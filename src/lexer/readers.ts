/**
 * Token Readers
 * Each reader is entered with the cursor just past the first character
 * of its token and extends the cursor over the rest of the lexeme.
 */

import type { Token } from '../types.js';
import { TOKEN_KINDS } from '../types.js';
import { isDigit, isIdentifierChar, tokenFromState } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  isAtEnd,
  lexeme,
  peek,
  type ScannerState,
} from './state.js';

/** Escape sequences accepted inside string literals */
const STRING_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
  ['\\', '\\'],
  ['"', '"'],
  ['0', '\0'],
]);

export function readIdentifier(state: ScannerState): Token {
  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    advance(state);
  }

  const kind = KEYWORDS.get(lexeme(state)) ?? TOKEN_KINDS.IDENTIFIER;
  return tokenFromState(state, kind);
}

function skipDigits(state: ScannerState): void {
  while (!isAtEnd(state) && isDigit(peek(state))) {
    advance(state);
  }
}

/** Length of an exponent suffix at the cursor, or 0 if there is none */
function exponentLength(state: ScannerState): number {
  const marker = peek(state);
  if (marker !== 'e' && marker !== 'E') return 0;

  const sign = peek(state, 1);
  const signWidth = sign === '+' || sign === '-' ? 1 : 0;
  return isDigit(peek(state, 1 + signWidth)) ? 1 + signWidth : 0;
}

export function readNumber(state: ScannerState): Token {
  skipDigits(state);
  let isFloat = false;

  // Fraction: '.' only counts when a digit follows
  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    advance(state); // consume .
    skipDigits(state);
    isFloat = true;
  }

  const exponent = exponentLength(state);
  if (exponent > 0) {
    for (let i = 0; i < exponent; i++) advance(state);
    skipDigits(state);
    isFloat = true;
  }

  return tokenFromState(
    state,
    isFloat ? TOKEN_KINDS.FLOAT_LITERAL : TOKEN_KINDS.INTEGER_LITERAL
  );
}

/**
 * Read a string literal. The token text keeps both quotes and the raw
 * escapes. A newline or end of input before the closing quote, or an
 * unknown escape, produces an Invalid token over the consumed text.
 */
export function readString(state: ScannerState): Token {
  let valid = true;

  while (!isAtEnd(state)) {
    const ch = peek(state);

    if (ch === '\n') break;

    if (ch === '"') {
      advance(state); // consume closing "
      return tokenFromState(
        state,
        valid ? TOKEN_KINDS.STRING_LITERAL : TOKEN_KINDS.INVALID
      );
    }

    advance(state);
    if (ch === '\\') {
      const escaped = peek(state);
      if (escaped === '' || escaped === '\n') break;
      if (!STRING_ESCAPES.has(escaped)) valid = false;
      advance(state);
    }
  }

  return tokenFromState(state, TOKEN_KINDS.INVALID);
}

/**
 * Unescaped value of a StringLiteral token's text.
 * Returns undefined when the text is not a well-formed string literal.
 */
export function decodeStringLiteral(text: string): string | undefined {
  if (text.length < 2 || !text.startsWith('"') || !text.endsWith('"')) {
    return undefined;
  }

  let value = '';
  let i = 1;
  const last = text.length - 1;
  while (i < last) {
    const ch = text.charAt(i);
    if (ch === '"' || ch === '\n') return undefined;
    if (ch === '\\') {
      const escaped = STRING_ESCAPES.get(text.charAt(i + 1));
      if (escaped === undefined || i + 1 >= last) return undefined;
      value += escaped;
      i += 2;
    } else {
      value += ch;
      i++;
    }
  }

  return value;
}
