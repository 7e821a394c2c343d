/**
 * Verification status and the worst-wins fold used for exit codes.
 *
 * Statuses are ordered by severity: ok < mismatch < error. Combining two
 * statuses keeps the more severe one, so a run's status can be folded in
 * order over the result stream without buffering it.
 */

import type { VerifyResult } from '../digest/types.js';
import type { ManifestEntryResult } from '../manifest/types.js';

/** Statuses from least to most severe */
export const VERIFICATION_STATUSES = ['ok', 'mismatch', 'error'] as const;

export type VerificationStatus = (typeof VERIFICATION_STATUSES)[number];

/** Process exit code for each status */
export const EXIT_CODES: Readonly<Record<VerificationStatus, number>> = {
  ok: 0,
  mismatch: 1,
  error: 2,
};

export function severityOf(status: VerificationStatus): number {
  return VERIFICATION_STATUSES.indexOf(status);
}

/**
 * Return the more severe of two statuses. 'ok' is the identity.
 */
export function worseStatus(a: VerificationStatus, b: VerificationStatus): VerificationStatus {
  return severityOf(b) > severityOf(a) ? b : a;
}

export function statusOfVerifyResult(result: VerifyResult): VerificationStatus {
  if (!result.success) return 'error';
  return result.outcome.kind === 'match' ? 'ok' : 'mismatch';
}

export function statusOfEntry(entry: ManifestEntryResult): VerificationStatus {
  if (!entry.success) return 'error';
  return statusOfVerifyResult(entry.result.result);
}

/**
 * Fold a result stream into its worst status.
 * An empty stream is 'ok'.
 */
export async function reduceStatus(
  entries: Iterable<ManifestEntryResult> | AsyncIterable<ManifestEntryResult>
): Promise<VerificationStatus> {
  let status: VerificationStatus = 'ok';
  for await (const entry of entries) {
    status = worseStatus(status, statusOfEntry(entry));
  }
  return status;
}

/**
 * Running counts over a result stream, for summaries.
 */
export class StatusTally {
  matched = 0;
  mismatched = 0;
  failed = 0;
  private current: VerificationStatus = 'ok';

  get total(): number {
    return this.matched + this.mismatched + this.failed;
  }

  /** Worst status seen so far */
  get status(): VerificationStatus {
    return this.current;
  }

  /**
   * Count one element and return its own status.
   */
  add(entry: ManifestEntryResult): VerificationStatus {
    const status = statusOfEntry(entry);
    switch (status) {
      case 'ok':
        this.matched++;
        break;
      case 'mismatch':
        this.mismatched++;
        break;
      case 'error':
        this.failed++;
        break;
    }
    this.current = worseStatus(this.current, status);
    return status;
  }
}
