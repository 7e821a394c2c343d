/**
 * sumcheck file <file-path> <expected-checksum>
 */

import * as path from 'node:path';
import { Command } from 'commander';
import {
  describeDigestProblem,
  statusOfVerifyResult,
  verifyChecksum,
} from '@sumcheck/core';
import type { VerificationStatus } from '@sumcheck/core';
import { formatFileResult } from '../ui.js';
import type { CliContext } from '../types.js';

/**
 * Verify one file against one expected digest and print the outcome.
 */
export async function runFileCheck(
  filePath: string,
  expectedDigest: string,
  ctx: CliContext
): Promise<VerificationStatus> {
  const problem = describeDigestProblem(expectedDigest);
  if (problem) {
    ctx.logger.warn({ expectedDigest }, `Expected checksum looks malformed: ${problem}`);
  }

  const absolutePath = path.resolve(filePath);
  const result = await verifyChecksum(absolutePath, expectedDigest);
  ctx.print(formatFileResult(absolutePath, result));

  return statusOfVerifyResult(result);
}

export function registerFileCommand(program: Command, getContext: () => CliContext): void {
  program
    .command('file')
    .description('Verify a single file against an expected MD5 checksum')
    .argument('<file-path>', 'file to hash')
    .argument('<expected-checksum>', 'expected lowercase hex MD5 digest')
    .action(async (filePath: string, expectedChecksum: string) => {
      const ctx = getContext();
      ctx.setStatus(await runFileCheck(filePath, expectedChecksum, ctx));
    });
}
