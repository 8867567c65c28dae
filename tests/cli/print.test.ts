/**
 * tallow-print command tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
  formatError,
  formatStats,
  parseArgs,
  runPrint,
} from '../../src/cli-shared.js';
import { InternalError, RuntimeError } from '../../src/index.js';

describe('parseArgs', () => {
  it('parses a file with options', () => {
    expect(parseArgs(['data.yaml', '--stats', '--config', 'c.yaml'])).toEqual({
      mode: 'print',
      file: 'data.yaml',
      config: 'c.yaml',
      stats: true,
    });
  });

  it('defaults to no config and no stats', () => {
    expect(parseArgs(['data.yaml'])).toEqual({
      mode: 'print',
      file: 'data.yaml',
      config: undefined,
      stats: false,
    });
  });

  it('shows help without a file or when asked', () => {
    expect(parseArgs([])).toEqual({ mode: 'help' });
    expect(parseArgs(['data.yaml', '--help'])).toEqual({ mode: 'help' });
    expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
  });

  it('rejects malformed arguments', () => {
    expect(() => parseArgs(['--config'])).toThrow(
      '--config requires a file argument'
    );
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs(['a.yaml', 'b.yaml'])).toThrow(
      'Unexpected argument: b.yaml'
    );
  });
});

describe('formatError', () => {
  it('labels runtime and internal errors with their ID', () => {
    expect(formatError(new RuntimeError('TALLOW-R005', { name: 'x' }))).toBe(
      'Runtime error [TALLOW-R005]: Unknown function: x'
    );
    expect(formatError(new InternalError('TALLOW-I004'))).toBe(
      'Internal error [TALLOW-I004]: Reference counting problem on null object'
    );
  });

  it('names the missing file', () => {
    const err = Object.assign(new Error('ENOENT: no such file'), {
      code: 'ENOENT',
      path: '/missing.yaml',
    });
    expect(formatError(err)).toBe('File not found: /missing.yaml');
  });

  it('falls back to the message', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
    expect(formatError('plain')).toBe('plain');
  });
});

describe('formatStats', () => {
  it('summarizes the heap', () => {
    expect(
      formatStats({
        liveBlocks: 2,
        liveBytes: 40,
        peakBytes: 72,
        totalAllocations: 5,
        failedAllocations: 0,
      })
    ).toBe('heap: 2 live blocks, 40 live bytes, peak 72 bytes');
  });
});

describe('runPrint', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tallow-print-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function capture(): { stdout: string[]; stderr: string[] } {
    return { stdout: [], stderr: [] };
  }

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  async function run(
    file: string,
    options: { config?: string; stats?: boolean } = {}
  ): Promise<{ code: number; stdout: string; stderr: string }> {
    const out = capture();
    const code = await runPrint(
      {
        mode: 'print',
        file,
        config: options.config,
        stats: options.stats ?? false,
      },
      {
        stdout: (text) => out.stdout.push(text),
        stderr: (text) => out.stderr.push(text),
      }
    );
    return { code, stdout: out.stdout.join(''), stderr: out.stderr.join('') };
  }

  it('prints a YAML document', async () => {
    const file = write('doc.yaml', 'name: demo\nitems:\n  - 1\n  - two\n');
    const result = await run(file);
    expect(result).toEqual({
      code: 0,
      stdout: '{"name" : "demo"\n "items" : [1, "two"]}\n',
      stderr: '',
    });
  });

  it('prints a top-level string raw', async () => {
    const file = write('text.yaml', 'hello\n');
    expect((await run(file)).stdout).toBe('hello\n');
  });

  it('keeps integers beyond 53 bits exact', async () => {
    const file = write('big.yaml', '- 9007199254740993\n');
    expect((await run(file)).stdout).toBe('[9007199254740993]\n');
  });

  it('reports heap accounting after release', async () => {
    const file = write('stats.yaml', '[1, 2]\n');
    const result = await run(file, { stats: true });
    const lines = result.stdout.split('\n');
    expect(lines[0]).toBe('[1, 2]');
    expect(lines[1]).toMatch(/^heap: 0 live blocks, 0 live bytes, peak \d+ bytes$/);
  });

  it('applies the configuration file', async () => {
    const config = write('wrap.yaml', 'print:\n  wrapThreshold: 2\n');
    const file = write('pair.yaml', '- 1\n- 2\n');
    expect((await run(file, { config })).stdout).toBe('[1, \n 2]\n');
  });

  it('fails when the heap limit is exceeded', async () => {
    const config = write('small.yaml', 'heap:\n  limitBytes: 32\n');
    const file = write('dict.yaml', 'a: 1\n');
    const result = await run(file, { config });
    expect(result).toEqual({
      code: 1,
      stdout: '',
      stderr: 'Runtime error [TALLOW-R001]: Out of memory in createString\n',
    });
  });

  it('fails for a missing file', async () => {
    const missing = path.join(dir, 'absent.yaml');
    const result = await run(missing);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe(`File not found: ${missing}\n`);
  });
});
