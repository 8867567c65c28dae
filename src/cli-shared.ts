/**
 * CLI Shared Utilities
 * Argument parsing, error formatting and the print command body
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { loadRuntimeConfig, type RuntimeConfig } from './config.js';
import { InternalError, RuntimeError } from './error-classes.js';
import {
  createHeap,
  createRuntime,
  fromHost,
  printObject,
  releaseReference,
  type HeapStats,
} from './index.js';

/** Output channels of a command */
export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export type PrintCommand =
  | { mode: 'print'; file: string; config?: string | undefined; stats: boolean }
  | { mode: 'help' }
  | { mode: 'version' };

/**
 * Parse command-line arguments into structured command
 *
 * @throws Error for unknown options or a missing option value
 */
export function parseArgs(argv: string[]): PrintCommand {
  if (argv.includes('--help')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  let file: string | undefined;
  let config: string | undefined;
  let stats = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;
    if (arg === '--stats') {
      stats = true;
    } else if (arg === '--config') {
      config = argv[++i];
      if (config === undefined) {
        throw new Error('--config requires a file argument');
      }
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    } else if (file === undefined) {
      file = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (file === undefined) {
    return { mode: 'help' };
  }
  return { mode: 'print', file, config, stats };
}

/**
 * Format error for stderr output
 */
export function formatError(err: unknown): string {
  if (err instanceof RuntimeError) {
    return `Runtime error [${err.errorId}]: ${err.message}`;
  }

  if (err instanceof InternalError) {
    return `Internal error [${err.errorId}]: ${err.message}`;
  }

  if (err instanceof yaml.YAMLParseError) {
    return `Parse error: ${err.message}`;
  }

  // Handle file not found errors (ENOENT)
  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err
  ) {
    return `File not found: ${String(err.path)}`;
  }

  return err instanceof Error ? err.message : String(err);
}

/** One-line heap summary */
export function formatStats(stats: HeapStats): string {
  return `heap: ${stats.liveBlocks} live blocks, ${stats.liveBytes} live bytes, peak ${stats.peakBytes} bytes`;
}

/**
 * Print a YAML or JSON document through the object model.
 *
 * @returns Process exit code
 */
export async function runPrint(
  command: Extract<PrintCommand, { mode: 'print' }>,
  io: CommandIO
): Promise<number> {
  try {
    const config: RuntimeConfig =
      command.config === undefined ? {} : await loadRuntimeConfig(command.config);
    const heap = createHeap(config.heap);
    const runtime = createRuntime({
      ...config,
      allocator: heap,
      callbacks: {
        onWrite: io.stdout,
        onDiagnostic: (error) => io.stderr(`${formatError(error)}\n`),
      },
    });

    const text = await fs.readFile(command.file, 'utf-8');
    const value = fromHost(runtime, yaml.parse(text, { intAsBigInt: true }));
    try {
      printObject({ write: io.stdout }, value, 0);
      io.stdout('\n');
    } finally {
      releaseReference(value);
    }

    if (command.stats) {
      io.stdout(`${formatStats(heap.stats())}\n`);
    }
    return 0;
  } catch (err) {
    io.stderr(`${formatError(err)}\n`);
    return 1;
  }
}
