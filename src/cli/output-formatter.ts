/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export interface FormattedResult {
  /** Machine-readable payload, printed unstyled to stdout. */
  readonly stdout: string | null;
  /** Human-facing status, printed to stderr. */
  readonly stderr: string;
}

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  if (isError) {
    lines.push(chalk.red(`✖ ${output.message}`));
  } else {
    lines.push(chalk.green(`✔ ${output.message}`));
  }

  if (output.details && output.details.length > 0) {
    output.details.forEach(detail => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    output.suggestions.forEach(suggestion => {
      lines.push(chalk.gray(`  → ${suggestion}`));
    });
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): FormattedResult {
  switch (result.kind) {
    case 'success':
      return {
        stdout: result.output?.data ?? null,
        stderr: result.output ? formatOutput(result.output, false) : '',
      };

    case 'failure':
      return { stdout: null, stderr: formatOutput(result.output, true) };
  }
}

/**
 * Print a CliResult: the payload alone on stdout so it can be piped,
 * everything else on stderr.
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (formatted.stdout !== null) {
    console.log(formatted.stdout);
  }
  if (formatted.stderr) {
    console.error(formatted.stderr);
  }
}
