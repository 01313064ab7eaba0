/**
 * CLI Shared Utilities
 * Common formatting functions for the minilex CLI
 */

import * as fs from 'fs';
import { formatToken } from './lexer/index.js';
import type { OutputFormat } from './config.js';
import {
  MINILEX_ERROR_CODES,
  MinilexError,
  TOKEN_KINDS,
  UsageError,
  type Token,
} from './types.js';

export interface FormatOutputOptions {
  format: OutputFormat;
  offsets: boolean;
}

/**
 * Render scanned tokens for stdout. EndOfInput is never rendered.
 *
 * @returns One line per token in text mode, a JSON array in json mode
 */
export function formatOutput(
  tokens: readonly Token[],
  options: FormatOutputOptions
): string {
  const visible = tokens.filter((t) => t.kind !== TOKEN_KINDS.END_OF_INPUT);

  if (options.format === 'json') {
    return JSON.stringify(
      visible.map((t) => ({
        kind: t.kind,
        text: t.text,
        start: t.span.start,
        end: t.span.end,
      })),
      null,
      2
    );
  }

  return visible
    .map((t) => formatToken(t, { offsets: options.offsets }))
    .join('\n');
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof UsageError && err.code === MINILEX_ERROR_CODES.CLI_USAGE) {
    return `Usage error: ${err.message}`;
  }

  if (err instanceof MinilexError) {
    return err.message;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Determine exit code from scanned tokens
 *
 * - strict off: always 0
 * - strict on: 1 when any Invalid token was produced
 */
export function determineExitCode(
  tokens: readonly Token[],
  strict: boolean
): { code: number; message?: string } {
  if (!strict) return { code: 0 };

  const invalid = tokens.filter((t) => t.kind === TOKEN_KINDS.INVALID);
  if (invalid.length === 0) return { code: 0 };

  const first = invalid[0];
  const where = first ? ` (first at offset ${first.span.start})` : '';
  return {
    code: 1,
    message: `${invalid.length} invalid token${invalid.length === 1 ? '' : 's'}${where}`,
  };
}

/**
 * Read the package version from package.json beside the build output
 */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')) as {
    version: string;
  };
  return packageJson.version;
}
