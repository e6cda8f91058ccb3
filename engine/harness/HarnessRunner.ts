/**
 * Grid Formula Harness - Runner
 *
 * Executes parsed commands against a Grid and produces structured output.
 * Everything runs synchronously: each command finishes, recompute
 * included, before the next one starts.
 */

import {
  ParsedCommand,
  Output,
  ResultOutput,
  ValueOutput,
  ErrorOutput,
  InfoOutput,
  StatsOutput,
  TableOutput,
  AssertOutput,
  EchoOutput,
  OutputBase,
  HarnessConfig,
  DEFAULT_CONFIG,
} from './types.js';
import { CommandParser, ParseError } from './CommandParser.js';
import { formatOutput } from './OutputFormatter.js';
import { CellEdit, Grid } from '../core/grid/Grid.js';
import { RecomputeResult } from '../core/grid/Recalculation.js';
import { CellRef, isFormulaInput } from '../core/types/index.js';
import {
  columnIndexToLabel,
  encodeReference,
  parseCellReference,
  parseRangeReference,
} from '../core/reference/CellReference.js';
import { extractDependencies } from '../core/formula/DependencyGraph.js';
import { parseNumericLiteral } from '../core/formula/FormulaEvaluator.js';

const label = (ref: CellRef): string => encodeReference(ref.row, ref.col);

// =============================================================================
// Harness Runner
// =============================================================================

export class HarnessRunner {
  private config: HarnessConfig;
  private grid: Grid;
  private parser = new CommandParser();

  private expectError: boolean = false;

  /** Set by abort(), checked between commands */
  private aborted: boolean = false;
  /** Current step count in script execution */
  private stepCount: number = 0;
  /** Whether the runner is currently executing */
  private isExecuting: boolean = false;

  // Output handler
  private outputHandler: (output: Output) => void;

  constructor(
    config: Partial<HarnessConfig> = {},
    outputHandler?: (output: Output) => void
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.outputHandler = outputHandler ?? this.defaultOutputHandler.bind(this);
    this.grid = this.createGrid();
  }

  private createGrid(): Grid {
    return new Grid(
      { rows: this.config.rows, cols: this.config.cols },
      { onRecalculate: (result) => this.logRecalculation(result) }
    );
  }

  private logRecalculation(result: RecomputeResult): void {
    if (!this.config.verbose) return;
    console.error(
      `[Recalc] ${result.evaluatedCount} evaluated, ${result.circular.length} circular, ` +
      `${result.errors.length} errors in ${result.duration.toFixed(2)}ms`
    );
  }

  /**
   * The grid commands run against.
   */
  getGrid(): Grid {
    return this.grid;
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  /**
   * Execute a single command. Thrown errors become error outputs.
   */
  execute(cmd: ParsedCommand): Output {
    const expecting = this.expectError;
    this.expectError = false;

    try {
      if (this.config.echoCommands) {
        this.emit(this.createEcho(cmd.raw, cmd));
      }

      const result = this.executeCommand(cmd);

      if (expecting) {
        return this.createError('Expected error but command succeeded', cmd);
      }

      return result;
    } catch (error) {
      if (expecting) {
        return this.createResult(true, { expectedError: true }, cmd);
      }

      const err = error instanceof Error ? error : new Error(String(error));
      return this.createError(err.message, cmd, this.config.verbose ? err.stack : undefined);
    }
  }

  /**
   * Execute multiple commands with step limit protection.
   */
  executeAll(commands: ParsedCommand[]): Output[] {
    const outputs: Output[] = [];
    this.stepCount = 0;
    this.aborted = false;
    this.isExecuting = true;

    try {
      for (const cmd of commands) {
        if (this.aborted) {
          outputs.push(this.createAbortError('Script was aborted', cmd));
          break;
        }

        this.stepCount++;
        if (this.stepCount > this.config.maxStepsPerScript) {
          outputs.push(this.createStepLimitError(this.stepCount, this.config.maxStepsPerScript, cmd));
          break;
        }

        const output = this.execute(cmd);
        outputs.push(output);
        this.emit(output);

        if (output.type === 'error' && this.config.stopOnError) {
          break;
        }

        if (cmd.type === 'QUIT') {
          break;
        }
      }
    } finally {
      this.isExecuting = false;
    }

    return outputs;
  }

  /**
   * Route command to appropriate handler.
   */
  private executeCommand(cmd: ParsedCommand): Output {
    switch (cmd.type) {
      // Cell operations
      case 'SET': return this.cmdSet(cmd);
      case 'GET': return this.cmdGet(cmd);
      case 'CLEAR': return this.cmdClear(cmd);
      case 'PASTE': return this.cmdPaste(cmd);

      // Recalculation
      case 'RECALC': return this.cmdRecalc(cmd);
      case 'DEPS': return this.cmdDeps(cmd);

      // State inspection
      case 'STATS': return this.cmdStats(cmd);
      case 'DUMP': return this.cmdDump(cmd);

      // Utility
      case 'ECHO': return this.cmdEcho(cmd);
      case 'ASSERT': return this.cmdAssert(cmd);
      case 'ASSERT_ERROR': return this.cmdAssertError(cmd);

      // Control
      case 'RESET': return this.cmdReset(cmd);
      case 'QUIT': return this.cmdQuit(cmd);
    }
  }

  // ===========================================================================
  // Cell Commands
  // ===========================================================================

  private cmdSet(cmd: ParsedCommand): Output {
    const [cellRef, ...valueParts] = cmd.args;
    const cell = this.requireCell(cellRef, 'SET');

    this.grid.applyEdit(cell.row, cell.col, valueParts.join(' '));

    return this.createResult(true, {
      cell: label(cell),
      input: this.grid.getInput(cell.row, cell.col),
      display: this.grid.getDisplayValue(cell.row, cell.col),
    }, cmd);
  }

  private cmdGet(cmd: ParsedCommand): Output {
    const cell = this.requireCell(cmd.args[0], 'GET');
    const data = this.grid.getCell(cell.row, cell.col);

    const output: ValueOutput = {
      type: 'value',
      ...this.base(cmd),
      cell,
      address: label(cell),
      value: {
        input: data.input,
        display: data.displayValue,
        hasError: data.hasError,
      },
    };
    return output;
  }

  private cmdClear(cmd: ParsedCommand): Output {
    const [ref] = cmd.args;

    if (!ref) {
      this.grid.clear();
      return this.createResult(true, { cleared: 'all' }, cmd);
    }

    const range = parseRangeReference(ref);
    if (!range) throw new Error(`Invalid range: ${ref}`);

    this.grid.clear(range);
    return this.createResult(true, { cleared: ref.toUpperCase() }, cmd);
  }

  /**
   * PASTE <cell> <text>: rows split on newlines, columns on tabs.
   * Applied as one batch, so a paste that overflows the grid changes nothing.
   */
  private cmdPaste(cmd: ParsedCommand): Output {
    const [cellRef, ...textParts] = cmd.args;
    const anchor = this.requireCell(cellRef, 'PASTE');

    const lines = textParts.join(' ').split(/\r?\n/);
    if (lines.length > 1 && lines[lines.length - 1] === '') {
      lines.pop();
    }

    const edits: CellEdit[] = [];
    let width = 0;
    lines.forEach((line, r) => {
      const values = line.split('\t');
      width = Math.max(width, values.length);
      values.forEach((input, c) => {
        edits.push({ row: anchor.row + r, col: anchor.col + c, input });
      });
    });

    this.grid.applyEdits(edits);

    const end = { row: anchor.row + lines.length - 1, col: anchor.col + width - 1 };
    return this.createResult(true, {
      pasted: edits.length,
      range: `${label(anchor)}:${label(end)}`,
    }, cmd);
  }

  // ===========================================================================
  // Recalculation Commands
  // ===========================================================================

  private cmdRecalc(cmd: ParsedCommand): Output {
    const result = this.grid.recompute();

    return this.createResult(true, {
      evaluated: result.evaluatedCount,
      circular: result.circular.map(label),
      errors: result.errors.map(({ cell, error }) => ({ cell: label(cell), code: error.code })),
    }, cmd);
  }

  private cmdDeps(cmd: ParsedCommand): Output {
    const cell = this.requireCell(cmd.args[0], 'DEPS');
    const input = this.grid.getInput(cell.row, cell.col);

    const precedents = isFormulaInput(input)
      ? extractDependencies(input.slice(1), {
          expandRanges: cmd.options.expand === true,
          bounds: this.grid.dimensions,
        })
      : [];

    return this.createResult(true, {
      cell: label(cell),
      precedents: precedents.map(label),
    }, cmd);
  }

  // ===========================================================================
  // State Inspection Commands
  // ===========================================================================

  private cmdStats(cmd: ParsedCommand): Output {
    const stats = this.grid.getStats();

    const output: StatsOutput = {
      type: 'stats',
      ...this.base(cmd),
      rows: stats.rows,
      cols: stats.cols,
      cellCount: stats.nonEmptyCells,
      formulaCount: stats.formulaCells,
      errorCount: stats.errorCells,
      recalculations: stats.recalculations,
    };

    return output;
  }

  /**
   * DUMP [range] [inputs=true]: display values (or inputs) as a table.
   * Without a range, dumps the used range.
   */
  private cmdDump(cmd: ParsedCommand): Output {
    const [rangeRef] = cmd.args;
    const showInputs = cmd.options.inputs === true;

    let range = this.grid.getUsedRange();
    if (rangeRef) {
      range = parseRangeReference(rangeRef);
      if (!range) throw new Error(`Invalid range: ${rangeRef}`);
    }

    const headers: string[] = [''];
    const rows: string[][] = [];

    if (range) {
      const endRow = Math.min(range.endRow, this.grid.rows - 1);
      const endCol = Math.min(range.endCol, this.grid.cols - 1);

      for (let col = range.startCol; col <= endCol; col++) {
        headers.push(columnIndexToLabel(col));
      }

      for (let row = range.startRow; row <= endRow; row++) {
        const rowData: string[] = [String(row + 1)];
        for (let col = range.startCol; col <= endCol; col++) {
          rowData.push(showInputs
            ? this.grid.getInput(row, col)
            : this.grid.getDisplayValue(row, col));
        }
        rows.push(rowData);
      }
    }

    const output: TableOutput = {
      type: 'table',
      ...this.base(cmd),
      headers,
      rows,
    };

    return output;
  }

  // ===========================================================================
  // Utility Commands
  // ===========================================================================

  private cmdEcho(cmd: ParsedCommand): Output {
    return this.createEcho(cmd.args.join(' '), cmd);
  }

  /**
   * ASSERT <cell> <op> <expected...>: compares the display value.
   * `==` and `!=` compare numerically when both sides are numbers, and
   * as text otherwise. Ordering operators need numbers on both sides.
   */
  private cmdAssert(cmd: ParsedCommand): Output {
    const [cellRef, operator, ...expectedParts] = cmd.args;
    if (!cellRef || !operator) throw new Error('ASSERT requires cell, operator, and expected value');

    const cell = this.requireCell(cellRef, 'ASSERT');
    const actual = this.grid.getDisplayValue(cell.row, cell.col);
    const expected = expectedParts.join(' ');

    const actualNum = parseNumericLiteral(actual);
    const expectedNum = parseNumericLiteral(expected);
    const bothNumeric = actualNum !== null && expectedNum !== null;
    const equal = actualNum !== null && expectedNum !== null ? actualNum === expectedNum : actual === expected;

    let passed: boolean;
    switch (operator) {
      case '==':
      case '=':
        passed = equal;
        break;
      case '!=':
      case '<>':
        passed = !equal;
        break;
      case '>':
        passed = bothNumeric && actualNum > expectedNum;
        break;
      case '<':
        passed = bothNumeric && actualNum < expectedNum;
        break;
      case '>=':
        passed = bothNumeric && actualNum >= expectedNum;
        break;
      case '<=':
        passed = bothNumeric && actualNum <= expectedNum;
        break;
      default:
        throw new Error(`Unknown operator: ${operator}`);
    }

    const output: AssertOutput = {
      type: 'assert',
      ...this.base(cmd),
      passed,
      expected,
      actual,
      message: passed ? undefined : `Assertion failed: ${label(cell)} ${operator} ${expected}`,
    };

    return output;
  }

  private cmdAssertError(cmd: ParsedCommand): Output {
    this.expectError = true;
    return this.createInfo('Expecting error on next command', cmd);
  }

  // ===========================================================================
  // Control Commands
  // ===========================================================================

  private cmdReset(cmd: ParsedCommand): Output {
    this.grid = this.createGrid();
    return this.createResult(true, { reset: true }, cmd);
  }

  private cmdQuit(cmd: ParsedCommand): Output {
    return this.createInfo('Quitting', cmd);
  }

  // ===========================================================================
  // Argument Helpers
  // ===========================================================================

  private requireCell(ref: string | undefined, command: string): CellRef {
    if (!ref) throw new Error(`${command} requires cell reference`);
    const cell = parseCellReference(ref);
    if (!cell) throw new Error(`Invalid cell reference: ${ref}`);
    return cell;
  }

  // ===========================================================================
  // Output Helpers
  // ===========================================================================

  private base(cmd: ParsedCommand): Omit<OutputBase, 'type'> {
    return {
      timestamp: this.config.includeTimestamps ? Date.now() : undefined,
      command: cmd.raw,
      lineNumber: this.config.includeLineNumbers ? cmd.lineNumber : undefined,
    };
  }

  private createResult(success: boolean, data: unknown, cmd: ParsedCommand): ResultOutput {
    return { type: 'result', ...this.base(cmd), success, data };
  }

  private createError(message: string, cmd: ParsedCommand, stack?: string): ErrorOutput {
    return { type: 'error', ...this.base(cmd), message, stack };
  }

  private createInfo(message: string, cmd: ParsedCommand): InfoOutput {
    return { type: 'info', ...this.base(cmd), message };
  }

  private createEcho(message: string, cmd: ParsedCommand): EchoOutput {
    return { type: 'echo', ...this.base(cmd), message };
  }

  private createStepLimitError(stepCount: number, maxSteps: number, cmd: ParsedCommand): ErrorOutput {
    return {
      type: 'error',
      ...this.base(cmd),
      message: `Step limit exceeded: ${stepCount} steps (max: ${maxSteps})`,
      errorType: 'StepLimitExceeded',
    };
  }

  private createAbortError(reason: string, cmd: ParsedCommand): ErrorOutput {
    return {
      type: 'error',
      ...this.base(cmd),
      message: `Script aborted: ${reason}`,
      errorType: 'ScriptAborted',
    };
  }

  private createParseError(error: ParseError): ErrorOutput {
    return {
      type: 'error',
      timestamp: this.config.includeTimestamps ? Date.now() : undefined,
      command: error.line,
      lineNumber: this.config.includeLineNumbers ? error.lineNumber : undefined,
      message: error.message,
    };
  }

  private emit(output: Output): void {
    this.outputHandler(output);
  }

  private defaultOutputHandler(output: Output): void {
    const text = formatOutput(output, this.config);
    if (output.type === 'error') {
      console.error(text);
    } else {
      console.log(text);
    }
  }

  // ===========================================================================
  // CLI Interface Methods
  // ===========================================================================

  /**
   * Set a custom output handler.
   */
  onOutput(handler: (output: Output) => void): void {
    this.outputHandler = handler;
  }

  /**
   * Execute a single line of input (for interactive mode).
   * Returns false if QUIT command was executed.
   */
  executeLine(line: string, lineNumber: number = 0): boolean {
    let cmd: ParsedCommand | null;
    try {
      cmd = this.parser.parse(line, lineNumber);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.emit(this.createParseError(error));
      if (this.config.stopOnError) throw error;
      return true;
    }

    if (!cmd) {
      return true;
    }

    const output = this.execute(cmd);
    this.emit(output);

    if (cmd.type === 'QUIT') {
      return false;
    }

    if (output.type === 'error' && this.config.stopOnError) {
      throw new Error(output.message);
    }

    return true;
  }

  /**
   * Execute a script (multiple lines). A line that does not parse stops
   * the script before anything runs.
   */
  executeScript(script: string): Output[] {
    let commands: ParsedCommand[];
    try {
      commands = this.parser.parseScript(script);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      const output = this.createParseError(error);
      this.emit(output);
      return [output];
    }

    return this.executeAll(commands);
  }

  /**
   * Request abort of the running script. Takes effect before the next command.
   */
  abort(reason: string = 'User requested abort'): void {
    if (this.isExecuting) {
      this.aborted = true;
      if (this.config.verbose) {
        console.error(`[Abort] ${reason}`);
      }
    }
  }

  /**
   * Check if the runner is currently executing a script.
   */
  isRunning(): boolean {
    return this.isExecuting;
  }

  /**
   * Get current step count (for monitoring/progress).
   */
  getStepCount(): number {
    return this.stepCount;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  outputHandler?: (output: Output) => void
): HarnessRunner {
  return new HarnessRunner(config, outputHandler);
}

/**
 * True when any output is an error or a failed assertion.
 */
export function hasFailures(outputs: Output[]): boolean {
  return outputs.some((o) => o.type === 'error' || (o.type === 'assert' && !o.passed));
}
