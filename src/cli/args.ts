/**
 * CLI argument parsing
 */

import { createRequire } from 'module';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };
import type {
  CompilerConfig,
  OutputFormat,
  ParsedArgs,
  Subcommand,
  Verbosity,
} from '../types/index.js';

const USAGE = 'Usage: sgr-template [options] <compile|literal|file> <input>';

interface RawArgs {
  positionalArgs: string[];
  raw: boolean | null;
  output: OutputFormat | null;
  verbosity: Verbosity | null;
  enableLog: boolean | null;
  logDir: string | null;
}

/**
 * Extract options from raw args, returning positional args and flags
 */
function extractOptions(args: string[]): RawArgs {
  // Handle --version and --help early
  if (args.includes('--version') || args.includes('-V')) {
    console.log(pkg.version);
    process.exit(0);
  }
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  let raw: boolean | null = null;
  let output: OutputFormat | null = null;
  let verbosity: Verbosity | null = null;
  let enableLog: boolean | null = null;
  let logDir: string | null = null;
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--') {
      positionalArgs.push(...args.slice(i + 1));
      break;
    } else if (arg === '--raw') {
      raw = true;
    } else if (arg === '--text') {
      output = 'text';
    } else if (arg === '--literal') {
      output = 'literal';
    } else if (arg === '--escaped') {
      output = 'escaped';
    } else if (arg === '--quiet') {
      verbosity = 'quiet';
    } else if (arg === '--normal') {
      verbosity = 'normal';
    } else if (arg === '--verbose') {
      verbosity = 'verbose';
    } else if (arg === '--log') {
      enableLog = true;
    } else if (arg === '--no-log') {
      enableLog = false;
    } else if (arg === '--log-dir') {
      logDir = args[++i] ?? null;
    } else if (arg.startsWith('--log-dir=')) {
      logDir = arg.slice(10);
    } else {
      positionalArgs.push(arg);
    }
  }

  return { positionalArgs, raw, output, verbosity, enableLog, logDir };
}

const VALID_SUBCOMMANDS: readonly string[] = ['compile', 'literal', 'file'];

function isValidSubcommand(value: string): value is Subcommand {
  return VALID_SUBCOMMANDS.includes(value);
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error(USAGE);
  process.exit(1);
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const { positionalArgs, raw, output, verbosity, enableLog, logDir } =
    extractOptions(args);

  const firstArg = positionalArgs[0];

  if (!firstArg) {
    fail('subcommand required');
  }
  if (!isValidSubcommand(firstArg)) {
    console.error(`Error: unknown subcommand '${firstArg}'`);
    console.error('Valid subcommands: compile, literal, file');
    console.error(USAGE);
    process.exit(1);
  }

  const subcommand = firstArg;
  const rest = positionalArgs.slice(1);
  let input = '';

  switch (subcommand) {
    case 'compile': {
      if (rest.length === 0) {
        fail('template text required');
      }
      input = rest.join(' ');
      break;
    }
    case 'literal': {
      if (rest.length === 0) {
        fail('string literal required');
      }
      input = rest.join(' ');
      break;
    }
    case 'file': {
      const file = rest[0];
      if (!file) {
        fail('template file required');
      }
      input = file;
      break;
    }
  }

  const config: Partial<CompilerConfig> = {};
  if (raw !== null) config.raw = raw;
  if (output !== null) {
    config.output = output;
  } else if (subcommand === 'literal') {
    config.output = 'literal';
  }
  if (verbosity !== null) config.verbosity = verbosity;
  if (enableLog !== null) config.enableLog = enableLog;
  if (logDir !== null) config.logDir = logDir;

  return { subcommand, input, config };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
sgr-template - compile styled templates into ANSI SGR escape sequences

${USAGE}

Subcommands:
  compile <template>   Compile the template text given on the command line
  literal <source>     Compile a quoted literal ("..." or r#"..."#) and print
                       the replacement literal
  file <path>          Compile the contents of a file

Template syntax:
  {+Bold}              Add a style (Reset Bold Dim Italic Underline Blinking
                       Inverse Hidden Strikethrough)
  {-Bold}              Remove a style
  {#RedFg} {#BlueBg}   Named color (Black Red Green Yellow Blue Magenta Cyan
                       White Default, with Fg or Bg)
  {#f(196)} {#b[1f]}   256-color palette index (decimal or hex)
  {#f(255,128,0)}      Truecolor (decimal triple or {#f[ff8000]})
  {+Bold&name-Bold}    Keep {name} for a later formatter between styles
  {{ }}                Literal braces

Options:
  --raw                Do not process backslash escapes
  --text               Print the compiled text (default)
  --literal            Print a quoted replacement literal
  --escaped            Print compiled text with control characters visible
  --quiet              Print only the compiled output
  --normal             Also print a one-line compile summary (default)
  --verbose            Print config and compile details
  --log                Write a compile log (see --log-dir)
  --no-log             Disable the compile log
  --log-dir <dir>      Log directory (default: logs)
  --version, -V        Print version
  --help, -h           Print this help

Configuration is read from ./sgr-template.json when present; flags win.
`);
}
