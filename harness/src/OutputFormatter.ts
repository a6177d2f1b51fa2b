/**
 * Tabula Harness - Output Formatting
 */

import { HarnessConfig, Output } from './types.js';

export function formatOutput(
  output: Output,
  config: Pick<HarnessConfig, 'outputFormat' | 'includeTimestamps' | 'verbose'>
): string {
  if (config.outputFormat === 'json') {
    return JSON.stringify(output);
  }

  const prefix = config.includeTimestamps
    ? `[${new Date(output.timestamp).toISOString().slice(11, 23)}] `
    : '';

  switch (output.type) {
    case 'result': {
      const data = config.verbose && output.data !== undefined ? `: ${JSON.stringify(output.data)}` : '';
      return `${prefix}${output.success ? 'OK' : 'FAIL'} ${output.command ?? ''}${data}`;
    }
    case 'value':
      return `${prefix}VALUE: ${JSON.stringify(output.value)}`;
    case 'error':
      return `${prefix}ERROR: ${output.message}`;
    case 'info':
      return `${prefix}INFO: ${output.message}`;
    case 'stats':
      return `${prefix}STATS: ${output.cellCount} cells, ${output.formulaCount} formulas, ${output.styleCount} styles, undo ${output.undoStackSize}, redo ${output.redoStackSize}`;
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

  const separator = colWidths.map(w => '-'.repeat(w + 2)).join('+');
  const formatRow = (row: string[]) =>
    row.map((cell, i) => ` ${cell.padEnd(colWidths[i])} `).join('|');

  return [formatRow(headers), separator, ...rows.map(formatRow)].join('\n');
}
