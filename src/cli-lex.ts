#!/usr/bin/env node
/**
 * minilex CLI - Scan a source file or string and print its tokens
 *
 * Usage:
 *   minilex program.src
 *   minilex -e 'rad = pi / 180'
 *   minilex --format json program.src
 */

import * as fs from 'fs/promises';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { createDefaultConfig, isOutputFormat, loadConfig } from './config.js';
import type { LexConfig, OutputFormat } from './config.js';
import {
  determineExitCode,
  formatError,
  formatOutput,
  readVersion,
} from './cli-shared.js';
import { tokenize } from './lexer/index.js';
import { MINILEX_ERROR_CODES, UsageError, type Token } from './types.js';

/** Flag values given on the command line; unset flags defer to config */
export interface LexFlags {
  format?: OutputFormat;
  offsets?: boolean;
  strict?: boolean;
}

/**
 * Parsed command-line arguments
 */
export type ParsedLexArgs =
  | { mode: 'file'; file: string; flags: LexFlags }
  | { mode: 'eval'; source: string; flags: LexFlags }
  | { mode: 'help' }
  | { mode: 'version' };

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseLexArgs(argv: string[]): ParsedLexArgs {
  // Check for --help or --version flags in any position, skipping option values
  const options: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-e' || arg === '--format') {
      i++;
    } else if (arg !== undefined) {
      options.push(arg);
    }
  }
  if (options.includes('--help') || options.includes('-h')) {
    return { mode: 'help' };
  }
  if (options.includes('--version') || options.includes('-v')) {
    return { mode: 'version' };
  }

  const flags: LexFlags = {};
  const positionals: string[] = [];
  let source: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--offsets') {
      flags.offsets = true;
    } else if (arg === '--strict') {
      flags.strict = true;
    } else if (arg === '--format') {
      const value = argv[++i];
      if (value === undefined || value.startsWith('-')) {
        throw new UsageError('--format requires argument: text or json');
      }
      if (!isOutputFormat(value)) {
        throw new UsageError(`Invalid format: ${value}. Expected text or json`);
      }
      flags.format = value;
    } else if (arg === '-e') {
      const value = argv[++i];
      if (value === undefined) {
        throw new UsageError('Missing source after -e');
      }
      source = value;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (source !== undefined) {
    if (positionals.length > 0) {
      throw new UsageError('Cannot combine -e with a file argument');
    }
    return { mode: 'eval', source, flags };
  }

  const [file, ...extra] = positionals;
  if (file === undefined) {
    throw new UsageError('Missing file argument');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument: ${extra[0] ?? ''}`);
  }
  return { mode: 'file', file, flags };
}

/** Flags win over the config file, which wins over the defaults */
export function resolveConfig(
  flags: LexFlags,
  fileConfig: LexConfig | null
): LexConfig {
  const base = fileConfig ?? createDefaultConfig();
  return {
    format: flags.format ?? base.format,
    offsets: flags.offsets ?? base.offsets,
    strict: flags.strict ?? base.strict,
  };
}

/**
 * Read and scan a source file
 *
 * @throws UsageError if the file does not exist
 */
export async function lexFile(file: string): Promise<Token[]> {
  try {
    await fs.access(file);
  } catch {
    throw new UsageError(
      `File not found: ${file}`,
      MINILEX_ERROR_CODES.CLI_FILE_NOT_FOUND,
      { file }
    );
  }

  const source = await fs.readFile(file, 'utf-8');
  return tokenize(source);
}

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`minilex - token scanner

Usage:
  minilex <file>              Scan a file and print its tokens
  minilex -e <source>         Scan an inline source string
  minilex --help              Show this help message
  minilex --version           Show version information

Options:
  --format text|json          Output format (default: text)
  --offsets                   Append token offsets to text output
  --strict                    Exit 1 when an invalid token is found

Configuration:
  Defaults are read from .minilex.yaml in the working directory.`);
}

/**
 * Run the CLI with the given arguments and return the exit code
 */
export async function run(argv: string[], cwd: string): Promise<number> {
  const command = parseLexArgs(argv);

  if (command.mode === 'help') {
    showHelp();
    return 0;
  }

  if (command.mode === 'version') {
    console.log(`minilex ${readVersion()}`);
    return 0;
  }

  const config = resolveConfig(command.flags, loadConfig(cwd));
  const tokens =
    command.mode === 'eval'
      ? tokenize(command.source)
      : await lexFile(command.file);

  const output = formatOutput(tokens, config);
  if (output !== '') {
    console.log(output);
  }

  const { code, message } = determineExitCode(tokens, config.strict);
  if (message !== undefined) {
    console.error(message);
  }
  return code;
}

/**
 * Run the CLI, reporting any error as one stderr line with exit code 1
 */
export async function runCli(argv: string[], cwd: string): Promise<number> {
  try {
    return await run(argv, cwd);
  } catch (err) {
    console.error(formatError(err instanceof Error ? err : new Error(String(err))));
    return 1;
  }
}

/**
 * Entry point for minilex binary
 */
async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), process.cwd());
}

/** True when this module is the process entry (npm links bins through a symlink) */
function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  void main();
}
