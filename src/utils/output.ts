import chalk from 'chalk';

export const icons = {
  success: chalk.green('✔'),
  error: chalk.red('✖'),
  warning: chalk.yellow('⚠'),
  step: chalk.blue('›'),
};

export function label(text: string): string {
  return chalk.dim(text);
}

export function value(text: string): string {
  return chalk.cyan(text);
}

/** Renders a command line the way it is shown before a stage starts. */
export function commandLine(text: string): string {
  return chalk.bold(`$ ${text}`);
}

/** Left-aligned columns; the last column is never padded. */
export function table(rows: string[][], columnGap = 2): string {
  if (rows.length === 0) return '';

  const colCount = Math.max(...rows.map((r) => r.length));
  const widths: number[] = [];

  for (let c = 0; c < colCount; c++) {
    widths[c] = Math.max(...rows.map((r) => (r[c] ?? '').length));
  }

  return rows
    .map((row) =>
      row
        .map((cell, i) =>
          i < row.length - 1 ? cell.padEnd(widths[i] + columnGap) : cell,
        )
        .join(''),
    )
    .join('\n');
}
