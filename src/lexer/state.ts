/**
 * Scanner State
 * Tracks the read cursor and the start of the current token attempt
 */

export interface ScannerState {
  readonly source: string;
  /** Read cursor; only ever moves forward */
  pos: number;
  /** Offset where the current token attempt began */
  start: number;
}

export function createScannerState(source: string): ScannerState {
  return {
    source,
    pos: 0,
    start: 0,
  };
}

/** Character at cursor + offset, or '' past the end */
export function peek(state: ScannerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function advance(state: ScannerState): string {
  const ch = state.source[state.pos] ?? '';
  if (state.pos < state.source.length) {
    state.pos++;
  }
  return ch;
}

/** Mark the cursor as the start of a new token attempt */
export function markStart(state: ScannerState): void {
  state.start = state.pos;
}

export function isAtEnd(state: ScannerState): boolean {
  return state.pos >= state.source.length;
}

/** Source text from the token start to the cursor */
export function lexeme(state: ScannerState): string {
  return state.source.slice(state.start, state.pos);
}
