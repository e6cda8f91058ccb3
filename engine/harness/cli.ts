#!/usr/bin/env node
/**
 * Grid Formula Harness - CLI Entry Point
 *
 * Usage:
 *   gridcalc [options]                 REPL when stdin is a terminal
 *   gridcalc [options] < script.txt    Run a script
 *   echo "SET A1 100" | gridcalc
 *
 * Exit code is 1 when a piped script produced an error or a failed assertion.
 */

import * as readline from 'readline';
import { HarnessRunner, createHarnessRunner, hasFailures } from './HarnessRunner.js';
import { HarnessConfig, DEFAULT_CONFIG } from './types.js';

// =============================================================================
// CLI Argument Parsing
// =============================================================================

interface CLIArgs {
  config: Partial<HarnessConfig>;
  help: boolean;
  interactive: boolean;
}

class CLIArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIArgumentError';
  }
}

function parseDimension(flag: string, value: string | undefined): number {
  const n = value === undefined ? NaN : Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new CLIArgumentError(`${flag} requires a positive integer`);
  }
  return n;
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    config: {},
    help: false,
    interactive: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--pretty':
        result.config.outputFormat = 'pretty';
        break;
      case '--json':
        result.config.outputFormat = 'json';
        break;
      case '--no-timestamps':
        result.config.includeTimestamps = false;
        break;
      case '--timestamps':
        result.config.includeTimestamps = true;
        break;
      case '--stop-on-error':
        result.config.stopOnError = true;
        break;
      case '--continue-on-error':
        result.config.stopOnError = false;
        break;
      case '--echo':
        result.config.echoCommands = true;
        break;
      case '--verbose':
      case '-v':
        result.config.verbose = true;
        break;
      case '--rows':
        result.config.rows = parseDimension(arg, args[++i]);
        break;
      case '--cols':
        result.config.cols = parseDimension(arg, args[++i]);
        break;
      case '--interactive':
      case '-i':
        result.interactive = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new CLIArgumentError(`Unknown option: ${arg}`);
    }
  }

  return result;
}

// =============================================================================
// Help Text
// =============================================================================

const HELP_TEXT = `
Grid Formula Harness

USAGE:
  gridcalc [options]                 Interactive REPL
  gridcalc [options] < script.txt    Run a script
  echo "SET A1 100" | gridcalc

OPTIONS:
  --pretty          Human-readable output (default: JSON)
  --json            JSON output (one object per line)
  --no-timestamps   Omit timestamps from output
  --stop-on-error   Stop execution on first error
  --echo            Echo commands before executing
  --verbose, -v     Log recalculation summaries to stderr
  --rows N          Grid rows (default: 20)
  --cols N          Grid columns (default: 10)
  --interactive, -i Force interactive mode
  --help, -h        Show this help message

COMMANDS:
  Cell Operations:
    SET <cell> <input>       Set input (number, text, or =formula)
    GET <cell>               Get input and display value
    CLEAR [range]            Clear all cells or a range
    PASTE <cell> <text>      Paste tab/newline separated values ("1\\t2\\n3\\t4")

  Recalculation:
    RECALC                   Recompute the whole grid
    DEPS <cell> [expand=true] List the cells a formula references

  State Inspection:
    STATS                    Grid statistics
    DUMP [range] [inputs=true] Dump display values (or inputs) as a table

  Utility:
    ECHO <message>           Print message
    ASSERT <cell> <op> <val> Assert display value (==, !=, <, >, <=, >=)
    ASSERT_ERROR             Expect next command to fail

  Control:
    RESET                    Start over with an empty grid
    QUIT                     Exit harness

FORMULAS:
  Operators + - * / and parentheses. References like A1, ranges like A1:B3
  inside functions. Functions: SUM PRODUCT AVERAGE MIN MAX COUNT ABS ROUND.
  Arguments are separated by ',' and ROUND takes its places after ';'.

EXAMPLES:
  SET A1 10
  SET A2 32
  SET A3 =SUM(A1:A2)
  ASSERT A3 == 42
  SET B1 =ROUND(AVERAGE(A1,A2,7);1)
  ASSERT B1 == 16.3
  SET C1 =C1+1
  ASSERT C1 == #ERROR
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  let cliArgs: CLIArgs;
  try {
    cliArgs = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof CLIArgumentError)) throw error;
    console.error(error.message);
    console.error('Run with --help for usage.');
    process.exit(1);
  }

  if (cliArgs.help) {
    console.log(HELP_TEXT);
    return;
  }

  const config: HarnessConfig = {
    ...DEFAULT_CONFIG,
    ...cliArgs.config,
  };

  const runner = createHarnessRunner(config);

  // Determine if interactive (TTY) or piped input
  const isInteractive = cliArgs.interactive || process.stdin.isTTY === true;

  if (isInteractive) {
    await runInteractive(runner, config);
  } else {
    await runPiped(runner);
  }
}

async function runInteractive(runner: HarnessRunner, config: HarnessConfig): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'grid> ',
  });

  if (config.verbose) {
    console.log('Grid Formula Harness');
    console.log('Type "help" for commands, "quit" to exit.');
    console.log('');
  }

  let lineNumber = 0;
  rl.prompt();

  for await (const line of rl) {
    lineNumber++;

    if (line.trim().toLowerCase() === 'help') {
      console.log(HELP_TEXT);
      rl.prompt();
      continue;
    }

    try {
      if (!runner.executeLine(line, lineNumber)) {
        break;
      }
    } catch (error) {
      // The runner has already reported the failure
      if (config.stopOnError) {
        process.exitCode = 1;
        break;
      }
      throw error;
    }

    rl.prompt();
  }

  rl.close();
}

async function runPiped(runner: HarnessRunner): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });

  const lines: string[] = [];
  for await (const line of rl) {
    lines.push(line);
  }

  const outputs = runner.executeScript(lines.join('\n'));
  process.exitCode = hasFailures(outputs) ? 1 : 0;
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
