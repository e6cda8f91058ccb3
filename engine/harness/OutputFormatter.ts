/**
 * Grid Formula Harness - Output Formatting
 *
 * Renders outputs as JSON lines or as human-readable text.
 */

import { HarnessConfig, Output } from './types.js';

export function formatOutput(
  output: Output,
  config: Pick<HarnessConfig, 'outputFormat' | 'includeTimestamps'>
): string {
  if (config.outputFormat === 'json') {
    return JSON.stringify(output);
  }

  const time = config.includeTimestamps && output.timestamp !== undefined
    ? `[${new Date(output.timestamp).toISOString().slice(11, 23)}] `
    : '';
  const line = output.lineNumber ? `[${output.lineNumber}] ` : '';
  const prefix = time + line;

  switch (output.type) {
    case 'result':
      return `${prefix}${output.success ? 'OK' : 'FAIL'}${output.data !== undefined ? `: ${JSON.stringify(output.data)}` : ''}`;

    case 'value':
      return `${prefix}${output.address} = ${JSON.stringify(output.value.display)}` +
        (output.value.input !== output.value.display ? ` (input: ${JSON.stringify(output.value.input)})` : '');

    case 'error':
      return `${prefix}ERROR: ${output.message}`;

    case 'info':
      return `${prefix}INFO: ${output.message}`;

    case 'stats':
      return `${prefix}STATS: ${output.rows}x${output.cols} grid, ${output.cellCount} cells, ` +
        `${output.formulaCount} formulas, ${output.errorCount} errors, ${output.recalculations} recalculations`;

    case 'table':
      return `${prefix}TABLE:\n${formatTable(output.headers, output.rows)}`;

    case 'assert':
      return `${prefix}ASSERT ${output.passed ? 'PASSED' : 'FAILED'}: expected=${JSON.stringify(output.expected)}, actual=${JSON.stringify(output.actual)}`;

    case 'echo':
      return `${prefix}ECHO: ${output.message}`;
  }
}

export function formatTable(headers: string[], rows: string[][]): string {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, i) =>
    allRows.reduce((width, row) => Math.max(width, (row[i] ?? '').length), 0)
  );

  const separator = colWidths.map((w) => '-'.repeat(w + 2)).join('+');
  const formatRow = (row: string[]): string =>
    row.map((cell, i) => ` ${(cell ?? '').padEnd(colWidths[i])} `).join('|');

  return [
    formatRow(headers),
    separator,
    ...rows.map(formatRow),
  ].join('\n');
}
