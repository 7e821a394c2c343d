/**
 * Types for the manifest module.
 *
 * A manifest pairs expected digests with file paths, one pair per line,
 * in the layout written by `md5sum`:
 *
 *   4d93d51945b88325c213640ef59fc50b  foo.txt
 */

import type { Logger } from 'pino';
import type { VerifyResult } from '../digest/types.js';

/** One parsed (file, expected digest) pair */
export interface ChecksumRecord {
  /** Path relative to the manifest's directory */
  readonly file: string;
  /** Expected lowercase hex digest */
  readonly checksum: string;
}

/** A manifest line that could not be split into digest and filename */
export interface ParseFailure {
  kind: 'parse-failure';
  /** 1-based line number in the manifest */
  lineNumber: number;
  /** The offending line, without its line terminator */
  line: string;
  /** Human-readable reason */
  message: string;
}

export interface ManifestLineRecord {
  success: true;
  record: ChecksumRecord;
  lineNumber: number;
}

export interface ManifestLineFailure {
  success: false;
  error: ParseFailure;
}

/** One retained manifest line: a record or a parse failure */
export type ManifestLine = ManifestLineRecord | ManifestLineFailure;

/** Outcome of verifying one record */
export interface ChecksumResult {
  /** Relative path as written in the manifest */
  file: string;
  result: VerifyResult;
}

export interface ManifestEntryChecked {
  success: true;
  result: ChecksumResult;
}

export interface ManifestEntryUnparsed {
  success: false;
  error: ParseFailure;
}

/** Element yielded by the manifest pipeline, one per retained line */
export type ManifestEntryResult = ManifestEntryChecked | ManifestEntryUnparsed;

/**
 * Lifecycle of a result sequence.
 *
 * - created: records parsed, nothing hashed yet
 * - draining: at least one element handed out
 * - exhausted: every element handed out, or the consumer stopped early
 */
export type PipelineState = 'created' | 'draining' | 'exhausted';

export interface VerifyManifestOptions {
  /** Logger for per-record diagnostics (default: silent) */
  logger?: Logger;
}
