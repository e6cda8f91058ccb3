/**
 * Grid Formula Harness - Module Exports
 *
 * A text-based harness for the grid formula engine.
 * Enables automated testing via stdin/stdout command protocol.
 */

export { CommandParser, createCommandParser, ParseError } from './CommandParser.js';

export { HarnessRunner, createHarnessRunner, hasFailures } from './HarnessRunner.js';

export { formatOutput, formatTable } from './OutputFormatter.js';

export type {
  CommandType,
  OptionValue,
  ParsedCommand,
  OutputType,
  Output,
  OutputBase,
  ResultOutput,
  CellValue,
  ValueOutput,
  ErrorOutput,
  InfoOutput,
  StatsOutput,
  TableOutput,
  AssertOutput,
  EchoOutput,
  HarnessConfig,
} from './types.js';

export { DEFAULT_CONFIG, COMMAND_TYPES, isCommandType } from './types.js';
