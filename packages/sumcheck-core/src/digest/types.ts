/**
 * Types for the digest module.
 *
 * Covers digest computation and the comparison of a file's digest
 * against an expected value.
 */

/** The one digest algorithm manifests are written with */
export type DigestAlgorithm = 'md5';

/** Result of comparing a computed digest with the expected one */
export type Outcome = OutcomeMatch | OutcomeMismatch;

export interface OutcomeMatch {
  kind: 'match';
}

export interface OutcomeMismatch {
  kind: 'mismatch';
  /** Digest the caller expected */
  expected: string;
  /** Digest computed from the file contents */
  actual: string;
}

/** A file that could not be hashed */
export interface HashFailure {
  kind: 'hash-failure';
  /** Path that was being read */
  path: string;
  /** Human-readable reason */
  message: string;
  /** System error code (ENOENT, EACCES, ...) when known */
  code?: string;
}

export interface VerifySuccess {
  success: true;
  outcome: Outcome;
}

export interface VerifyFailure {
  success: false;
  error: HashFailure;
}

/** Result of verifying one file. A mismatch is still a success. */
export type VerifyResult = VerifySuccess | VerifyFailure;
