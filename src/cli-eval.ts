#!/usr/bin/env node
/**
 * Restruct CLI - Evaluate a spec against JSON or YAML input
 *
 * Usage:
 *   restruct 'a.b' < data.json
 *   restruct --help
 *   restruct --version
 */

import * as fs from 'fs';
import { runCli, type CliIO } from './cli-shared.js';

/**
 * Read version from package.json
 */
function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return 'unknown';
}

const io: CliIO = {
  readFile: (path) => fs.readFileSync(path, 'utf-8'),
  readStdin: () => fs.readFileSync(0, 'utf-8'),
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  version: readVersion,
};

process.exitCode = runCli(process.argv.slice(2), io);
