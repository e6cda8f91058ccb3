/**
 * Grid Formula Harness - Types
 *
 * Command protocol and output types for stdin/stdout testing.
 */

// =============================================================================
// Command Types
// =============================================================================

export const COMMAND_TYPES = [
  // Cell operations
  'SET',           // SET A1 100 | SET A1 =SUM(B1:B10)
  'GET',           // GET A1
  'CLEAR',         // CLEAR (all) | CLEAR A1:B10
  'PASTE',         // PASTE A1 "1\t2\n3\t4"

  // Recalculation
  'RECALC',        // RECALC
  'DEPS',          // DEPS A1 [expand=true]

  // State inspection
  'STATS',         // STATS
  'DUMP',          // DUMP A1:B10 [inputs=true]

  // Utility
  'ECHO',          // ECHO message
  'ASSERT',        // ASSERT A1 == 100
  'ASSERT_ERROR',  // ASSERT_ERROR (next command should fail)

  // Control
  'RESET',         // RESET
  'QUIT',          // QUIT
] as const;

export type CommandType = (typeof COMMAND_TYPES)[number];

export function isCommandType(value: string): value is CommandType {
  return COMMAND_TYPES.some((type) => type === value);
}

export type OptionValue = string | boolean | number;

export interface ParsedCommand {
  type: CommandType;
  args: string[];
  options: Record<string, OptionValue>;
  raw: string;
  lineNumber: number;
}

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'result'    // Command result
  | 'value'     // Cell value
  | 'error'     // Error message
  | 'info'      // Info message
  | 'stats'     // Statistics
  | 'table'     // Tabular data dump
  | 'assert'    // Assertion result
  | 'echo';     // Echo output

export interface OutputBase {
  type: OutputType;
  timestamp?: number;
  command?: string;
  lineNumber?: number;
}

export interface ResultOutput extends OutputBase {
  type: 'result';
  success: boolean;
  data?: unknown;
}

export interface CellValue {
  input: string;
  display: string;
  hasError: boolean;
}

export interface ValueOutput extends OutputBase {
  type: 'value';
  cell: { row: number; col: number };
  address: string;
  value: CellValue;
}

export interface ErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  errorType?: 'ScriptAborted' | 'StepLimitExceeded';
  stack?: string;
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
}

export interface StatsOutput extends OutputBase {
  type: 'stats';
  rows: number;
  cols: number;
  cellCount: number;
  formulaCount: number;
  errorCount: number;
  recalculations: number;
}

export interface TableOutput extends OutputBase {
  type: 'table';
  headers: string[];
  rows: string[][];
}

export interface AssertOutput extends OutputBase {
  type: 'assert';
  passed: boolean;
  expected: string;
  actual: string;
  message?: string;
}

export interface EchoOutput extends OutputBase {
  type: 'echo';
  message: string;
}

export type Output =
  | ResultOutput
  | ValueOutput
  | ErrorOutput
  | InfoOutput
  | StatsOutput
  | TableOutput
  | AssertOutput
  | EchoOutput;

// =============================================================================
// Harness Configuration
// =============================================================================

export interface HarnessConfig {
  /** Output format: 'json' (one JSON per line) or 'pretty' (human readable) */
  outputFormat: 'json' | 'pretty';
  /** Include timestamps in output */
  includeTimestamps: boolean;
  /** Include line numbers in output */
  includeLineNumbers: boolean;
  /** Stop on first error */
  stopOnError: boolean;
  /** Echo commands before executing */
  echoCommands: boolean;
  /** Verbose mode (extra logging) */
  verbose: boolean;
  /** Maximum commands per script execution */
  maxStepsPerScript: number;
  /** Grid rows */
  rows: number;
  /** Grid columns */
  cols: number;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  includeTimestamps: true,
  includeLineNumbers: true,
  stopOnError: false,
  echoCommands: false,
  verbose: false,
  maxStepsPerScript: 10000,
  rows: 20,
  cols: 10,
};
