import chalk from 'chalk';
import type {
  ManifestEntryResult,
  StatusTally,
  VerifyResult,
} from '@sumcheck/core';

export function banner(): string {
  return [
    '',
    chalk.bold('  ┌─┐┬ ┬┌┬┐┌─┐┬ ┬┌─┐┌─┐┬┌─'),
    chalk.bold('  └─┐│ │││││  ├─┤├┤ │  ├┴┐'),
    chalk.bold('  └─┘└─┘┴ ┴└─┘┴ ┴└─┘└─┘┴ ┴'),
    chalk.dim('  exit status: 0 all matched, 1 mismatch, 2 error'),
    '',
  ].join('\n');
}

/**
 * "(3/8 37.50%) " style prefix for manifest result lines.
 */
export function progressText(done: number, total: number): string {
  const percent = total === 0 ? 100 : (done / total) * 100;
  return chalk.dim(`(${done}/${total} ${percent.toFixed(2)}%)`) + ' ';
}

export function formatFileResult(filePath: string, result: VerifyResult): string {
  if (!result.success) {
    return `${chalk.red('✗')} Error verifying checksum for ${filePath}: ${result.error.message}`;
  }
  if (result.outcome.kind === 'match') {
    return `${chalk.green('✓')} ${filePath} checksum matched`;
  }
  const { expected, actual } = result.outcome;
  return `${chalk.yellow('✗')} ${filePath} checksum mismatch: expected ${expected}, actual ${actual}`;
}

export function formatEntry(entry: ManifestEntryResult): string {
  if (!entry.success) {
    return `line ${entry.error.lineNumber}: ${chalk.red('parse error')}: ${entry.error.message}`;
  }

  const { file, result } = entry.result;
  if (!result.success) {
    return `${file}: ${chalk.red('error')}: ${result.error.message}`;
  }
  if (result.outcome.kind === 'match') {
    return `${file}: ${chalk.green('match')}`;
  }
  const { expected, actual } = result.outcome;
  return `${file}: ${chalk.yellow('mismatch')} (expected ${expected}, actual ${actual})`;
}

export function formatSummary(tally: StatusTally): string {
  return chalk.bold(
    `${tally.total} entries: ${tally.matched} matched, ${tally.mismatched} mismatched, ${tally.failed} failed`
  );
}

export function formatRunError(message: string): string {
  return `${chalk.red('Error verifying checksum:')} ${message}`;
}
