/**
 * CLI Shared Utilities
 * Argument parsing, data loading and formatting for the restruct binary
 */

import * as yaml from 'yaml';
import { RestructError } from './error-classes.js';
import { evaluate, shortStack } from './runtime/index.js';

export type DataFormat = 'json' | 'yaml';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'eval';
      spec: { source: 'inline'; text: string } | { source: 'file'; path: string };
      specFormat: DataFormat;
      targetFile: string | undefined;
      targetFormat: DataFormat;
      indent: number;
      trace: boolean;
    }
  | { mode: 'help' }
  | { mode: 'version' };

/** Raised for malformed command lines (exit code 2) */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Process boundary, injected so the CLI can run in-process */
export interface CliIO {
  readFile(path: string): string;
  readStdin(): string;
  stdout(text: string): void;
  stderr(text: string): void;
  version(): string;
}

const VALUE_OPTIONS = new Set([
  '--spec-file',
  '--spec-format',
  '--target-file',
  '--target-format',
  '--indent',
]);

function parseFormat(option: string, value: string): DataFormat {
  if (value === 'json' || value === 'yaml') return value;
  throw new UsageError(`${option} must be json or yaml, got ${value}`);
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const values = new Map<string, string>();
  const positional: string[] = [];
  let trace = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--trace') {
      trace = true;
    } else if (VALUE_OPTIONS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined) throw new UsageError(`Missing value for ${arg}`);
      values.set(arg, value);
      i++;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const specFile = values.get('--spec-file');
  if (positional.length > 1) {
    throw new UsageError(`Unexpected argument: ${positional[1] ?? ''}`);
  }
  const inline = positional[0];
  if (inline !== undefined && specFile !== undefined) {
    throw new UsageError('Give either a spec or --spec-file, not both');
  }

  let spec: Extract<ParsedArgs, { mode: 'eval' }>['spec'];
  if (specFile !== undefined) spec = { source: 'file', path: specFile };
  else if (inline !== undefined) spec = { source: 'inline', text: inline };
  else throw new UsageError('Missing spec argument');

  const indentText = values.get('--indent') ?? '2';
  const indent = Number(indentText);
  if (!Number.isInteger(indent) || indent < 0) {
    throw new UsageError(`--indent must be a non-negative integer, got ${indentText}`);
  }

  return {
    mode: 'eval',
    spec,
    specFormat: parseFormat('--spec-format', values.get('--spec-format') ?? 'yaml'),
    targetFile: values.get('--target-file'),
    targetFormat: parseFormat(
      '--target-format',
      values.get('--target-format') ?? 'yaml'
    ),
    indent,
    trace,
  };
}

/** Parse JSON or YAML text into a value */
export function parseData(text: string, format: DataFormat): unknown {
  return format === 'json' ? JSON.parse(text) : yaml.parse(text);
}

function toJsonValue(_key: string, value: unknown): unknown {
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return [...value];
  if (typeof value === 'bigint') return value.toString();
  return value;
}

/**
 * Convert an evaluation result to JSON text
 *
 * @param value - The value to format
 * @param indent - Spaces per indentation level (0 for a single line)
 */
export function formatOutput(value: unknown, indent = 2): string {
  const text: string | undefined = JSON.stringify(value, toJsonValue, indent);
  return text ?? 'null';
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @param trace - Append the frame trace captured by the engine
 */
export function formatError(err: unknown, trace = false): string {
  if (!(err instanceof Error)) return String(err);
  if (err instanceof SyntaxError) return `Parse error: ${err.message}`;
  if (
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err &&
    typeof err.path === 'string'
  ) {
    return `File not found: ${err.path}`;
  }
  if (err instanceof RestructError) {
    const message = err.format();
    if (trace && err.scope) return `${message}\n${shortStack(err.scope)}`;
    return message;
  }
  return `${err.name}: ${err.message}`;
}

export const HELP_TEXT = `Restructure JSON or YAML data with a declarative spec

Usage:
  restruct <spec> [options]        Evaluate an inline spec against stdin
  restruct --spec-file <path>      Read the spec from a file
  restruct --help                  Show this help message
  restruct --version               Show version information

Options:
  --target-file <path>             Read the target from a file instead of stdin
  --target-format json|yaml        Target format (default: yaml, which reads JSON too)
  --spec-format json|yaml          Spec format (default: yaml)
  --indent <n>                     Output indentation (default: 2)
  --trace                          Print the evaluation trace on failure

Examples:
  echo '{"a": {"b": 1}}' | restruct a.b
  restruct '{name: user.name, ids: [id]}' --target-file data.json`;

/**
 * Run the CLI against injected IO
 *
 * @returns Process exit code: 0 success, 1 evaluation or input failure, 2 usage error
 */
export function runCli(argv: readonly string[], io: CliIO): number {
  let command: ParsedArgs;
  try {
    command = parseArgs(argv);
  } catch (err) {
    io.stderr(formatError(err));
    io.stderr(`Run 'restruct --help' for usage`);
    return 2;
  }

  if (command.mode === 'help') {
    io.stdout(HELP_TEXT);
    return 0;
  }
  if (command.mode === 'version') {
    io.stdout(`restruct ${io.version()}`);
    return 0;
  }

  try {
    const specText =
      command.spec.source === 'file'
        ? io.readFile(command.spec.path)
        : command.spec.text;
    const spec = parseData(specText, command.specFormat);
    const targetText =
      command.targetFile !== undefined
        ? io.readFile(command.targetFile)
        : io.readStdin();
    const target = parseData(targetText, command.targetFormat);

    io.stdout(formatOutput(evaluate(target, spec), command.indent));
    return 0;
  } catch (err) {
    io.stderr(formatError(err, command.trace));
    return 1;
  }
}
