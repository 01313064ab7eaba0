/**
 * minilex CLI Tests: argument parsing and execution
 */

import { describe, expect, it, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  lexFile,
  parseLexArgs,
  resolveConfig,
  run,
  runCli,
} from '../../src/cli-lex.js';
import { MINILEX_ERROR_CODES, UsageError } from '../../src/types.js';

describe('minilex', () => {
  describe('parseLexArgs', () => {
    it('parses a file argument', () => {
      expect(parseLexArgs(['prog.src'])).toEqual({
        mode: 'file',
        file: 'prog.src',
        flags: {},
      });
    });

    it('parses -e with flags in any position', () => {
      expect(
        parseLexArgs(['--strict', '-e', 'a = 1', '--format', 'json'])
      ).toEqual({
        mode: 'eval',
        source: 'a = 1',
        flags: { strict: true, format: 'json' },
      });
    });

    it('parses --offsets', () => {
      expect(parseLexArgs(['--offsets', 'x.src'])).toEqual({
        mode: 'file',
        file: 'x.src',
        flags: { offsets: true },
      });
    });

    it('returns help and version modes before validating', () => {
      expect(parseLexArgs(['--bogus', '--help'])).toEqual({ mode: 'help' });
      expect(parseLexArgs(['-v'])).toEqual({ mode: 'version' });
    });

    it('treats option-like text after -e as source', () => {
      expect(parseLexArgs(['-e', '-v'])).toEqual({
        mode: 'eval',
        source: '-v',
        flags: {},
      });
      expect(parseLexArgs(['-e', '--help', '--strict'])).toEqual({
        mode: 'eval',
        source: '--help',
        flags: { strict: true },
      });
    });

    it('rejects a missing file', () => {
      expect(() => parseLexArgs([])).toThrow('Missing file argument');
    });

    it('rejects a missing -e value', () => {
      expect(() => parseLexArgs(['-e'])).toThrow('Missing source after -e');
    });

    it('rejects -e combined with a file', () => {
      expect(() => parseLexArgs(['-e', 'x', 'y.src'])).toThrow(
        'Cannot combine -e with a file argument'
      );
    });

    it('rejects extra positional arguments', () => {
      expect(() => parseLexArgs(['a.src', 'b.src'])).toThrow(
        'Unexpected argument: b.src'
      );
    });

    it('rejects an unknown format', () => {
      expect(() => parseLexArgs(['--format', 'xml', 'a.src'])).toThrow(
        'Invalid format: xml. Expected text or json'
      );
      expect(() => parseLexArgs(['a.src', '--format'])).toThrow(
        '--format requires argument: text or json'
      );
    });

    it('rejects unknown options with UsageError', () => {
      expect(() => parseLexArgs(['--color', 'a.src'])).toThrow(UsageError);
      expect(() => parseLexArgs(['--color', 'a.src'])).toThrow(
        'Unknown option: --color'
      );
    });
  });

  describe('resolveConfig', () => {
    it('uses defaults without flags or file', () => {
      expect(resolveConfig({}, null)).toEqual({
        format: 'text',
        offsets: false,
        strict: false,
      });
    });

    it('lets flags override the config file', () => {
      expect(
        resolveConfig(
          { format: 'text' },
          { format: 'json', offsets: true, strict: false }
        )
      ).toEqual({ format: 'text', offsets: true, strict: false });
    });
  });

  describe('run', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'minilex-cli-'));
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
      rmSync(dir, { recursive: true, force: true });
    });

    it('prints one line per token', async () => {
      const code = await run(['-e', 'rad = // calculate 1 radii\npi / 180'], dir);

      expect(code).toBe(0);
      expect(console.log).toHaveBeenCalledTimes(1);
      expect(console.log).toHaveBeenCalledWith(
        '<Identifier> : rad\n= : =\n<Identifier> : pi\n/ : /\n<Integer Literal> : 180'
      );
    });

    it('prints nothing for input without tokens', async () => {
      expect(await run(['-e', '  // only a comment'], dir)).toBe(0);
      expect(console.log).not.toHaveBeenCalled();
    });

    it('prints JSON when asked', async () => {
      expect(await run(['-e', 'a', '--format', 'json'], dir)).toBe(0);
      expect(console.log).toHaveBeenCalledWith(
        JSON.stringify([{ kind: 'Identifier', text: 'a', start: 0, end: 1 }], null, 2)
      );
    });

    it('keeps exit code 0 for invalid tokens without --strict', async () => {
      expect(await run(['-e', '@'], dir)).toBe(0);
      expect(console.log).toHaveBeenCalledWith('<Invalid> : @');
      expect(console.error).not.toHaveBeenCalled();
    });

    it('exits 1 for invalid tokens with --strict', async () => {
      expect(await run(['--strict', '-e', 'x @'], dir)).toBe(1);
      expect(console.error).toHaveBeenCalledWith('1 invalid token (first at offset 2)');
    });

    it('reads defaults from .minilex.yaml', async () => {
      writeFileSync(join(dir, '.minilex.yaml'), 'offsets: true\n', 'utf-8');

      expect(await run(['-e', 'x'], dir)).toBe(0);
      expect(console.log).toHaveBeenCalledWith('<Identifier> : x @0..1');
    });

    it('scans a file', async () => {
      const file = join(dir, 'prog.src');
      writeFileSync(file, 'if (n >= 1) return n;', 'utf-8');

      expect(await run([file], dir)).toBe(0);
      expect(console.log).toHaveBeenCalledWith(
        [
          'if : if',
          '( : (',
          '<Identifier> : n',
          '>= : >=',
          '<Integer Literal> : 1',
          ') : )',
          'return : return',
          '<Identifier> : n',
          '; : ;',
        ].join('\n')
      );
    });

    it('prints the package version', async () => {
      expect(await run(['--version'], dir)).toBe(0);
      expect(console.log).toHaveBeenCalledWith('minilex 0.1.0');
    });

    it('prints help', async () => {
      expect(await run(['--help'], dir)).toBe(0);
      expect(console.log).toHaveBeenCalledTimes(1);
    });
  });

  describe('runCli', () => {
    beforeEach(() => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('reports usage errors on one stderr line', async () => {
      expect(await runCli(['--bogus'], tmpdir())).toBe(1);
      expect(console.error).toHaveBeenCalledTimes(1);
      expect(console.error).toHaveBeenCalledWith(
        'Usage error: Unknown option: --bogus'
      );
      expect(console.log).not.toHaveBeenCalled();
    });

    it('reports a missing file', async () => {
      const missing = join(tmpdir(), 'minilex-missing', 'nope.src');

      expect(await runCli([missing], tmpdir())).toBe(1);
      expect(console.error).toHaveBeenCalledTimes(1);
      expect(console.error).toHaveBeenCalledWith(`File not found: ${missing}`);
    });

    it('passes through the exit code of a successful run', async () => {
      expect(await runCli(['-e', 'x'], tmpdir())).toBe(0);
      expect(console.log).toHaveBeenCalledWith('<Identifier> : x');
    });
  });

  describe('lexFile', () => {
    it('returns all tokens including EndOfInput', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'minilex-file-'));
      const file = join(dir, 'a.src');
      writeFileSync(file, 'x', 'utf-8');

      try {
        const tokens = await lexFile(file);
        expect(tokens.map((t) => t.kind)).toEqual(['Identifier', 'EndOfInput']);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it('throws UsageError for a missing file', async () => {
      const missing = join(tmpdir(), 'minilex-missing', 'nope.src');
      await expect(lexFile(missing)).rejects.toMatchObject({
        name: 'UsageError',
        code: MINILEX_ERROR_CODES.CLI_FILE_NOT_FOUND,
        message: `File not found: ${missing}`,
      });
    });
  });
});
