import chalk from "chalk";

export function successMsg(msg: string): string {
  return chalk.green(`  ✓ ${msg}`);
}

export function warnMsg(msg: string): string {
  return chalk.yellow(`  ⚠ ${msg}`);
}

export function errorMsg(msg: string): string {
  return chalk.red(`  ✗ ${msg}`);
}

export function heading(msg: string): string {
  return chalk.bold(msg);
}

export function dim(msg: string): string {
  return chalk.dim(msg);
}

/**
 * Quality score as a 10-cell bar, coloured against the acceptance threshold.
 */
export function scoreBar(score: number, threshold: number): string {
  const width = 10;
  const clamped = Math.min(Math.max(score, 0), 1);
  const filled = Math.round(clamped * width);
  const bar = "#".repeat(filled) + "-".repeat(width - filled);
  const text = `[${bar}] ${clamped.toFixed(2)}`;
  return clamped >= threshold ? chalk.green(text) : chalk.yellow(text);
}
