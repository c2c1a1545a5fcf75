import { stripVTControlCharacters } from 'node:util';
import chalk from 'chalk';

export const icons = {
  success: chalk.green('✔'),
  error: chalk.red('✖'),
  warning: chalk.yellow('⚠'),
  info: chalk.blue('ℹ'),
};

export function header(text: string): string {
  return chalk.bold.underline(text);
}

export function label(text: string): string {
  return chalk.dim(text);
}

export function value(text: string): string {
  return chalk.cyan(text);
}

export function toggle(enabled: boolean): string {
  return enabled ? chalk.green('on') : chalk.dim('off');
}

function visibleWidth(cell: string): number {
  return stripVTControlCharacters(cell).length;
}

/** Left-aligned columns; widths ignore ANSI colour codes. */
export function table(rows: string[][], columnGap = 2): string {
  if (rows.length === 0) return '';

  const colCount = Math.max(...rows.map((r) => r.length));
  const widths: number[] = [];

  for (let c = 0; c < colCount; c++) {
    widths[c] = Math.max(...rows.map((r) => visibleWidth(r[c] ?? '')));
  }

  return rows
    .map((row) =>
      row
        .map((cell, i) =>
          i < row.length - 1
            ? cell + ' '.repeat(widths[i] - visibleWidth(cell) + columnGap)
            : cell,
        )
        .join(''),
    )
    .join('\n');
}
