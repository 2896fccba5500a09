import { readFileSync, statSync } from 'fs';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_MAX_INPUT_SIZE } from './constants';
import { sanitizeText } from './scrub';

export class CLIUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIUsageError';
  }
}

export type ColorMode = 'auto' | 'always' | 'never';

export interface CLIOptions {
  check: boolean;
  help: boolean;
  version: boolean;
  colorMode: ColorMode | undefined;
  verbose: boolean;
  quiet: boolean;
  configPath: string | null;
  maxInputSize?: number;
  files: string[];
}

export interface CLIConfigFile {
  maxInputSize?: number;
  color?: ColorMode;
}

/** Where the CLI reads and writes; swapped out by tests. */
export interface CLIIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Buffer;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly stderrIsTTY: boolean;
  readonly cwd: string;
}

export const EXIT_SUCCESS = 0;
export const EXIT_CHECK_FAILURE = 1;
export const EXIT_USAGE_OR_IO_ERROR = 2;

const CONFIG_FILE_NAME = '.sqlscrubrc.json';

// ANSI color helpers. Off under NO_COLOR or --no-color, and when stderr is not a TTY.
const RESET = '\x1b[0m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

interface Palette {
  red(s: string): string;
  green(s: string): string;
  bold(s: string): string;
  dim(s: string): string;
}

function createPalette(enabled: boolean): Palette {
  const wrap = (code: string) => (s: string) => (enabled ? `${code}${s}${RESET}` : s);
  return { red: wrap(RED), green: wrap(GREEN), bold: wrap(BOLD), dim: wrap(DIM) };
}

function isColorEnabled(mode: ColorMode, io: CLIIO): boolean {
  if (mode === 'always') return true;
  if (mode === 'never') return false;
  const runningInCI = io.env.CI !== undefined || io.env.GITHUB_ACTIONS !== undefined;
  return io.env.NO_COLOR === undefined && io.stderrIsTTY && !runningInCI;
}

// Injected at build time by tsup's `define` option from package.json.
declare const __SQLSCRUB_VERSION__: string | undefined;

function readVersion(): string {
  if (typeof __SQLSCRUB_VERSION__ !== 'undefined') {
    return __SQLSCRUB_VERSION__;
  }
  // Fallback for development (running from sources without a build)
  try {
    const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function helpText(): string {
  return `sqlscrub - Strip literal values out of SQL before it is logged

  Replaces quoted strings, numbers, NULL/TRUE/FALSE, value lists and
  repeated INSERT rows with placeholders, and drops comments. Keywords,
  identifiers and existing ? / $1 placeholders are kept as written.

Usage: sqlscrub [options] [file ...]

  Reads standard input when no file is given.

Options:
  -h, --help            Show this help text
  -V, --version         Show version

Sanitizing:
  --check               Print nothing; exit 1 when an input still contains values
  --max-input-size <n>  Maximum input size in bytes (default: ${DEFAULT_MAX_INPUT_SIZE})
  --config <path>       Use an explicit config file (default: ${CONFIG_FILE_NAME})

Output:
  -v, --verbose         Print progress details to stderr
  --quiet               Suppress all output except errors
  --no-color            Alias for --color=never
  --color <mode>        Colorize output: auto|always|never (default: auto)

Examples:
  sqlscrub slow-query.sql
  echo "SELECT * FROM users WHERE id = 42;" | sqlscrub
  sqlscrub --check captured/*.sql

Exit codes:
  0  Success (or every input already sanitized with --check)
  1  Check failure
  2  Usage or I/O error`;
}

function parseColorModeArg(value: string): ColorMode {
  if (value === 'auto' || value === 'always' || value === 'never') {
    return value;
  }
  throw new CLIUsageError(`--color must be one of: auto, always, never (got '${value}')`);
}

export function parseArgs(args: string[]): CLIOptions {
  const opts: CLIOptions = {
    check: false,
    help: false,
    version: false,
    colorMode: undefined,
    verbose: false,
    quiet: false,
    configPath: null,
    maxInputSize: undefined,
    files: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--check') {
      opts.check = true;
      continue;
    }
    if (arg === '--help' || arg === '-h') {
      opts.help = true;
      continue;
    }
    if (arg === '--version' || arg === '-V') {
      opts.version = true;
      continue;
    }
    if (arg === '--max-input-size') {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new CLIUsageError('--max-input-size requires a numeric argument');
      }
      const parsed = Number(next);
      if (!Number.isFinite(parsed) || !Number.isInteger(parsed) || parsed < 1) {
        throw new CLIUsageError('--max-input-size must be an integer >= 1');
      }
      opts.maxInputSize = parsed;
      i++;
      continue;
    }
    if (arg.startsWith('--color=')) {
      opts.colorMode = parseColorModeArg(arg.slice('--color='.length));
      continue;
    }
    if (arg === '--color') {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new CLIUsageError('--color requires one of: auto, always, never');
      }
      opts.colorMode = parseColorModeArg(next);
      i++;
      continue;
    }
    if (arg === '--no-color') {
      opts.colorMode = 'never';
      continue;
    }
    if (arg === '--verbose' || arg === '-v') {
      opts.verbose = true;
      continue;
    }
    if (arg === '--quiet') {
      opts.quiet = true;
      continue;
    }
    if (arg === '--config') {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new CLIUsageError('--config requires a path argument');
      }
      opts.configPath = next;
      i++;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      throw new CLIUsageError(`Unknown option: ${arg}. Run --help for usage.`);
    }

    opts.files.push(arg);
  }

  if (opts.verbose && opts.quiet) {
    throw new CLIUsageError('--verbose and --quiet cannot be used together');
  }

  return opts;
}

export function validateConfigShape(raw: unknown, sourcePath: string): CLIConfigFile {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new CLIUsageError(`${sourcePath} must contain a JSON object`);
  }
  const cfg: CLIConfigFile = {};

  if ('maxInputSize' in raw && raw.maxInputSize !== undefined) {
    const value = raw.maxInputSize;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new CLIUsageError(`${sourcePath}: maxInputSize must be an integer >= 1`);
    }
    cfg.maxInputSize = value;
  }
  if ('color' in raw && raw.color !== undefined) {
    const value = raw.color;
    if (value !== 'auto' && value !== 'always' && value !== 'never') {
      throw new CLIUsageError(`${sourcePath}: color must be one of auto, always, never`);
    }
    cfg.color = value;
  }
  return cfg;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function loadConfig(cwd: string, explicitPath: string | null): CLIConfigFile {
  const configPath = explicitPath ? resolve(cwd, explicitPath) : join(cwd, CONFIG_FILE_NAME);
  const label = explicitPath ? configPath : CONFIG_FILE_NAME;
  try {
    const content = readFileSync(configPath, 'utf8');
    const parsed: unknown = JSON.parse(content);
    return validateConfigShape(parsed, label);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      if (explicitPath) {
        throw new CLIUsageError(`Config file not found: ${configPath}`);
      }
      return {};
    }
    if (err instanceof CLIUsageError) throw err;
    if (err instanceof SyntaxError) {
      throw new CLIUsageError(`Invalid JSON in ${label}: ${err.message}`);
    }
    throw new CLIUsageError(`Failed to read ${label}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Decode raw input bytes. UTF-16 is recognized by its byte order mark; a
 * UTF-8 byte order mark is dropped.
 */
export function decodeSqlText(raw: Buffer): string {
  if (raw.length >= 2 && raw[0] === 0xff && raw[1] === 0xfe) {
    return raw.subarray(2).toString('utf16le');
  }
  if (raw.length >= 2 && raw[0] === 0xfe && raw[1] === 0xff) {
    // swap16 needs an even length; a dangling byte cannot be decoded anyway.
    const swapped = Buffer.from(raw.subarray(2, raw.length - (raw.length % 2)));
    swapped.swap16();
    return swapped.toString('utf16le');
  }
  if (raw.length >= 3 && raw[0] === 0xef && raw[1] === 0xbb && raw[2] === 0xbf) {
    return raw.subarray(3).toString('utf8');
  }
  return raw.toString('utf8');
}

function isDirectoryPath(filepath: string): boolean {
  try {
    return statSync(filepath).isDirectory();
  } catch {
    return false;
  }
}

function readInput(raw: Buffer, label: string, maxInputSize: number): string {
  if (raw.length > maxInputSize) {
    throw new CLIUsageError(
      `${label}: input is ${raw.length} bytes, larger than the maximum of ${maxInputSize}. Use --max-input-size to raise the limit.`
    );
  }
  return decodeSqlText(raw);
}

function withTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : text + '\n';
}

export const processIO: CLIIO = {
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text);
  },
  readStdin: () => readFileSync(0),
  env: process.env,
  stderrIsTTY: !!process.stderr.isTTY,
  cwd: process.cwd(),
};

/**
 * Run the command line with `args` (without the node and script paths).
 * Returns the process exit code.
 */
export function runCli(args: string[], io: CLIIO = processIO): number {
  const log = (text: string) => io.stdout(text + '\n');
  const warn = (text: string) => io.stderr(text + '\n');
  let palette = createPalette(false);

  try {
    const opts = parseArgs(args);

    if (opts.version) {
      log(readVersion());
      return EXIT_SUCCESS;
    }

    if (opts.help) {
      log(helpText());
      return EXIT_SUCCESS;
    }

    const config = loadConfig(io.cwd, opts.configPath);
    palette = createPalette(isColorEnabled(opts.colorMode ?? config.color ?? 'auto', io));
    const maxInputSize = opts.maxInputSize ?? config.maxInputSize ?? DEFAULT_MAX_INPUT_SIZE;

    const inputs: Array<{ label: string; read: () => Buffer }> = [];
    if (opts.files.length === 0 || (opts.files.length === 1 && opts.files[0] === '-')) {
      inputs.push({ label: '<stdin>', read: () => io.readStdin() });
    } else {
      for (const file of opts.files) {
        if (file === '-') {
          throw new CLIUsageError("'-' (stdin) cannot be combined with file arguments");
        }
        const path = resolve(io.cwd, file);
        if (isDirectoryPath(path)) {
          if (!opts.quiet) warn(palette.red(`Warning: skipping directory '${file}'`));
          continue;
        }
        inputs.push({ label: file, read: () => readFileSync(path) });
      }
    }

    if (opts.verbose) {
      warn(`Sanitizing ${inputs.length} input${inputs.length === 1 ? '' : 's'}...`);
    }

    let checkFailures = 0;
    for (let index = 0; index < inputs.length; index++) {
      const { label, read } = inputs[index];
      if (opts.verbose) {
        warn(palette.dim(`[${index + 1}/${inputs.length}] ${label}`));
      }

      const input = readInput(read(), label, maxInputSize);
      const output = sanitizeText(input);

      if (opts.check) {
        if (output !== input) {
          checkFailures++;
          if (!opts.quiet) warn(palette.red(`${label}: contains unsanitized values`));
        }
        continue;
      }

      if (!opts.quiet) io.stdout(withTrailingNewline(output));
    }

    if (opts.check) {
      if (checkFailures > 0) {
        if (!opts.quiet) {
          warn(palette.bold(`${checkFailures} of ${inputs.length} input${inputs.length === 1 ? '' : 's'} not sanitized.`));
        }
        return EXIT_CHECK_FAILURE;
      }
      if (!opts.quiet && inputs.length > 0) {
        warn(palette.green('All inputs are sanitized.'));
      }
    }

    return EXIT_SUCCESS;
  } catch (err) {
    if (err instanceof CLIUsageError) {
      warn(palette.red(err.message));
      return EXIT_USAGE_OR_IO_ERROR;
    }

    const code = errorCode(err);
    if (err instanceof Error && (code === 'ENOENT' || code === 'EISDIR' || code === 'EACCES')) {
      warn(palette.red(`I/O error: ${err.message}`));
      return EXIT_USAGE_OR_IO_ERROR;
    }

    warn(palette.red(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`));
    return EXIT_USAGE_OR_IO_ERROR;
  }
}
