/**
 * Tokenizer
 * Main dispatch loop and the pull-based Scanner
 */

import type { Token } from '../types.js';
import { TOKEN_KINDS } from '../types.js';
import {
  isDigit,
  isLetter,
  isWhitespace,
  makeToken,
  tokenFromState,
} from './helpers.js';
import { EQUALS_SUFFIX_OPERATORS, SINGLE_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createScannerState,
  isAtEnd,
  markStart,
  peek,
  type ScannerState,
} from './state.js';

/** Notification hooks; they observe tokens but cannot change them */
export interface ScannerCallbacks {
  /** Called for every token returned by next(), including EndOfInput */
  onToken?: (token: Token) => void;
  /** Called for each Invalid token */
  onInvalid?: (token: Token) => void;
}

export interface ScannerOptions {
  callbacks?: ScannerCallbacks;
}

function skipLineComment(state: ScannerState): void {
  while (!isAtEnd(state) && peek(state) !== '\n') {
    advance(state);
  }
}

function endOfInput(state: ScannerState): Token {
  const end = state.source.length;
  return makeToken(TOKEN_KINDS.END_OF_INPUT, '', end, end);
}

/**
 * Classify one UTF-16 unit against the operator tables. Anything else is
 * Invalid; a character outside the BMP yields one Invalid token per surrogate.
 */
function readOperator(state: ScannerState, ch: string): Token {
  const pair = EQUALS_SUFFIX_OPERATORS[ch];
  if (pair) {
    if (peek(state) === '=') {
      advance(state); // consume =
      return tokenFromState(state, pair[1]);
    }
    return tokenFromState(state, pair[0]);
  }

  return tokenFromState(state, SINGLE_CHAR_OPERATORS[ch] ?? TOKEN_KINDS.INVALID);
}

/**
 * Scan the next token from the cursor. Whitespace and line comments are
 * consumed without producing a token. Returns EndOfInput once the cursor
 * reaches the end, and keeps returning it on later calls.
 */
export function nextToken(state: ScannerState): Token {
  while (!isAtEnd(state)) {
    markStart(state);
    const ch = advance(state);

    if (isWhitespace(ch)) continue;

    if (ch === '/' && peek(state) === '/') {
      skipLineComment(state);
      continue;
    }

    if (isLetter(ch)) {
      return readIdentifier(state);
    }

    if (isDigit(ch)) {
      return readNumber(state);
    }

    if (ch === '"') {
      return readString(state);
    }

    return readOperator(state, ch);
  }

  return endOfInput(state);
}

export class Scanner {
  private readonly state: ScannerState;
  private readonly callbacks: ScannerCallbacks;

  constructor(source: string, options: ScannerOptions = {}) {
    this.state = createScannerState(source);
    this.callbacks = options.callbacks ?? {};
  }

  /** Current cursor offset */
  get position(): number {
    return this.state.pos;
  }

  next(): Token {
    const token = nextToken(this.state);

    if (token.kind === TOKEN_KINDS.INVALID) {
      this.callbacks.onInvalid?.(token);
    }
    this.callbacks.onToken?.(token);

    return token;
  }
}

/** Scan the whole source. The last token is always EndOfInput. */
export function tokenize(source: string, options?: ScannerOptions): Token[] {
  const scanner = new Scanner(source, options);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = scanner.next();
    tokens.push(token);
  } while (token.kind !== TOKEN_KINDS.END_OF_INPUT);

  return tokens;
}
