#!/usr/bin/env node
/**
 * Tallow CLI - Render a YAML or JSON document through the object model
 *
 * Usage:
 *   tallow-print data.yaml
 *   tallow-print data.yaml --config tallow.yaml --stats
 *   tallow-print --help
 *   tallow-print --version
 */

import * as fs from 'fs';
import { parseArgs, runPrint } from './cli-shared.js';

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`Tallow Document Printer

Usage:
  tallow-print <file>              Print a YAML or JSON document
  tallow-print <file> --stats      Also report heap accounting after release
  tallow-print <file> --config <f> Load runtime options from a YAML file
  tallow-print --help              Show this help message
  tallow-print --version           Show version information`);
}

/**
 * Display version information
 */
function showVersion(): void {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')) as {
    version: string;
  };
  console.log(`tallow-print ${packageJson.version}`);
}

/**
 * Entry point for tallow-print binary
 */
async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));

  if (command.mode === 'help') {
    showHelp();
    return;
  }

  if (command.mode === 'version') {
    showVersion();
    return;
  }

  process.exitCode = await runPrint(command, {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  });
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
