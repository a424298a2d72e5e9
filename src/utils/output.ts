/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { PruneReport } from '../pipeline.js';
import type { StageStatus } from '../filters/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print the per-stage summary of a run
 */
export function printReport(report: PruneReport): void {
  console.log(chalk.bold('\nStage summary:\n'));

  const width = Math.max(...report.stages.map((s) => s.stage.length));
  for (const stage of report.stages) {
    const status = getStatusColor(stage.status)(stage.status.padEnd(14));
    const counts = chalk.gray(`${stage.kept}/${stage.read} kept`);
    const warnings = stage.warnings.length > 0 ? chalk.yellow(` ${stage.warnings.length} warning(s)`) : '';
    console.log(`  ${stage.stage.padEnd(width)}  ${status} ${counts}${warnings}`);
  }

  console.log(chalk.bold('\nKeep-sets:\n'));
  for (const [name, size] of Object.entries(report.keepSets)) {
    console.log(`  ${chalk.gray(name + ':')} ${size}`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

function getStatusColor(status: StageStatus): typeof chalk.green {
  switch (status) {
    case 'filtered':
      return chalk.green;
    case 'skipped':
      return chalk.cyan;
    case 'missing-source':
      return chalk.yellow;
    case 'failed':
      return chalk.red;
  }
}
