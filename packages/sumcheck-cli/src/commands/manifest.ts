/**
 * sumcheck manifest <checksum-path>
 */

import { Command } from 'commander';
import {
  ManifestUnavailableError,
  StatusTally,
  verifyManifest,
} from '@sumcheck/core';
import type { ChecksumResults, VerificationStatus } from '@sumcheck/core';
import { formatEntry, formatRunError, formatSummary, progressText } from '../ui.js';
import type { CliContext } from '../types.js';

/**
 * Verify every entry of a manifest, printing one line per entry as it is
 * checked, then a summary. Returns the worst status seen.
 */
export async function runManifestCheck(
  manifestPath: string,
  ctx: CliContext
): Promise<VerificationStatus> {
  let results: ChecksumResults;
  try {
    results = await verifyManifest(manifestPath, { logger: ctx.logger });
  } catch (error) {
    if (error instanceof ManifestUnavailableError) {
      ctx.print(formatRunError(error.message));
      return 'error';
    }
    throw error;
  }

  const tally = new StatusTally();
  for await (const entry of results) {
    tally.add(entry);
    const prefix = ctx.config.showProgress ? progressText(tally.total, results.total) : '';
    ctx.print(prefix + formatEntry(entry));
  }

  ctx.print(formatSummary(tally));
  return tally.status;
}

export function registerManifestCommand(program: Command, getContext: () => CliContext): void {
  program
    .command('manifest')
    .description('Verify every file listed in an md5sum-style checksum manifest')
    .argument('<checksum-path>', 'manifest file; listed paths are relative to its directory')
    .action(async (checksumPath: string) => {
      const ctx = getContext();
      ctx.setStatus(await runManifestCheck(checksumPath, ctx));
    });
}
