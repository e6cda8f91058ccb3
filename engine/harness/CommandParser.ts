/**
 * Grid Formula Harness - Command Parser
 *
 * Parses text commands into structured command objects.
 *
 * Command syntax:
 *   COMMAND [args...] [key=value...]
 *
 * Cell Operations:
 *   SET A1 100                             - Set cell input
 *   SET A1 "Hello World"                   - Set text with spaces
 *   SET A1 =SUM(B1:B10)                    - Set formula
 *   GET A1                                 - Get input and display value
 *   CLEAR [A1:B10]                         - Clear all or a range
 *   PASTE A1 "1\t2\n3\t4"                  - Paste tab-separated rows at A1
 *
 * Recalculation:
 *   RECALC                                 - Full recompute
 *   DEPS A1 [expand=true]                  - Cells A1's formula references
 *
 * State Inspection:
 *   STATS / DUMP [A1:B10] [inputs=true]
 */

import { OptionValue, ParsedCommand, isCommandType } from './types.js';

const OPTION_KEY = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

// Formula input carries its own '=' and must never be read as key=value
const RAW_ARGUMENT_COMMANDS: ReadonlySet<string> = new Set(['SET', 'ECHO', 'ASSERT', 'PASTE']);

export class CommandParser {
  /**
   * Parse a single command line.
   */
  parse(line: string, lineNumber: number = 0): ParsedCommand | null {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) {
      return null;
    }

    const tokens = this.tokenize(trimmed, lineNumber);
    if (tokens.length === 0) return null;

    // First token is the command
    const type = tokens[0].toUpperCase();
    if (!isCommandType(type)) {
      throw new ParseError(`Unknown command: ${type}`, lineNumber, trimmed);
    }

    const args: string[] = [];
    const options: Record<string, OptionValue> = {};
    const allowOptions = !RAW_ARGUMENT_COMMANDS.has(type);

    for (let i = 1; i < tokens.length; i++) {
      const token = tokens[i];
      const eqIndex = token.indexOf('=');
      const key = token.substring(0, eqIndex);

      if (allowOptions && eqIndex > 0 && OPTION_KEY.test(key)) {
        options[key] = this.parseOptionValue(token.substring(eqIndex + 1));
      } else {
        args.push(token);
      }
    }

    return {
      type,
      args,
      options,
      raw: trimmed,
      lineNumber,
    };
  }

  /**
   * Parse multiple lines.
   */
  parseLines(lines: string[]): ParsedCommand[] {
    const commands: ParsedCommand[] = [];

    for (let i = 0; i < lines.length; i++) {
      const cmd = this.parse(lines[i], i + 1);
      if (cmd) {
        commands.push(cmd);
      }
    }

    return commands;
  }

  /**
   * Parse a script (multiline string).
   */
  parseScript(script: string): ParsedCommand[] {
    return this.parseLines(script.split(/\r?\n/));
  }

  /**
   * Tokenize a command line, respecting quoted strings.
   */
  private tokenize(line: string, lineNumber: number): string[] {
    const tokens: string[] = [];
    let current = '';
    let inQuotes = false;
    let quoteChar = '';

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (inQuotes) {
        if (char === quoteChar) {
          tokens.push(current);
          current = '';
          inQuotes = false;
          quoteChar = '';
        } else if (char === '\\' && i + 1 < line.length) {
          const next = line[i + 1];
          if (next === quoteChar || next === '\\' || next === 'n' || next === 't') {
            if (next === 'n') current += '\n';
            else if (next === 't') current += '\t';
            else current += next;
            i++;
          } else {
            current += char;
          }
        } else {
          current += char;
        }
      } else if (char === '"' || char === "'") {
        if (current !== '') {
          tokens.push(current);
          current = '';
        }
        inQuotes = true;
        quoteChar = char;
      } else if (char === ' ' || char === '\t') {
        if (current !== '') {
          tokens.push(current);
          current = '';
        }
      } else {
        current += char;
      }
    }

    if (inQuotes) {
      throw new ParseError('Unterminated string', lineNumber, line);
    }

    if (current !== '') {
      tokens.push(current);
    }

    return tokens;
  }

  /**
   * Parse an option value to appropriate type.
   */
  private parseOptionValue(value: string): OptionValue {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;

    if (/^-?\d+\.?\d*$/.test(value)) {
      return parseFloat(value);
    }

    return value;
  }
}

// =============================================================================
// Parse Error
// =============================================================================

export class ParseError extends Error {
  lineNumber: number;
  line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Parse error at line ${lineNumber}: ${message}\n  ${line}`);
    this.name = 'ParseError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCommandParser(): CommandParser {
  return new CommandParser();
}
