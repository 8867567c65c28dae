/**
 * Runtime Configuration
 *
 * Loads runtime options from a YAML file:
 *
 *   heap:
 *     limitBytes: 65536
 *   print:
 *     wrapThreshold: 5
 *
 * Both sections and both keys are optional.
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { RuntimeError } from './error-classes.js';
import type { RuntimeOptions } from './runtime/core/types.js';

/** Options that a configuration file can set */
export type RuntimeConfig = Pick<RuntimeOptions, 'heap' | 'print'>;

function invalid(source: string, reason: string): RuntimeError {
  return new RuntimeError('TALLOW-R009', { source, reason });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read an optional non-negative integer key of a section */
function readCount(
  section: Record<string, unknown>,
  key: string,
  path: string,
  source: string
): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw invalid(source, `${path}.${key} must be a non-negative integer`);
  }
  return value;
}

/** Read an optional section of the document */
function readSection(
  document: Record<string, unknown>,
  name: string,
  source: string
): Record<string, unknown> | undefined {
  const section = document[name];
  if (section === undefined || section === null) return undefined;
  if (!isRecord(section)) {
    throw invalid(source, `${name} must be a mapping`);
  }
  return section;
}

/**
 * Parse configuration text.
 *
 * @param text - YAML source (JSON is accepted too)
 * @param source - Name used in error messages
 * @throws RuntimeError (TALLOW-R009) for malformed YAML or unexpected shapes
 */
export function parseRuntimeConfig(text: string, source = '<config>'): RuntimeConfig {
  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (error) {
    throw invalid(source, error instanceof Error ? error.message : String(error));
  }

  // yaml.parse returns null for empty content
  if (document === null || document === undefined) return {};
  if (!isRecord(document)) {
    throw invalid(source, 'top level must be a mapping');
  }

  const config: RuntimeConfig = {};
  const heap = readSection(document, 'heap', source);
  if (heap !== undefined) {
    config.heap = { limitBytes: readCount(heap, 'limitBytes', 'heap', source) };
  }

  const print = readSection(document, 'print', source);
  if (print !== undefined) {
    const wrapThreshold = readCount(print, 'wrapThreshold', 'print', source);
    config.print = wrapThreshold === undefined ? {} : { wrapThreshold };
  }

  return config;
}

/** Load configuration from a YAML file */
export async function loadRuntimeConfig(filePath: string): Promise<RuntimeConfig> {
  const text = await fs.readFile(filePath, 'utf-8');
  return parseRuntimeConfig(text, filePath);
}
