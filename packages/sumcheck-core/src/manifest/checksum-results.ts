/**
 * Lazy result sequence for a parsed manifest.
 *
 * Records are parsed up front so the total is known before anything is
 * hashed; each call to next() hashes at most one file. The sequence is a
 * single forward pass. Verifying again needs a new instance.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { verifyChecksum } from '../digest/digest-engine.js';
import type {
  ManifestEntryResult,
  ManifestLine,
  PipelineState,
} from './types.js';

export class ChecksumResults implements AsyncIterableIterator<ManifestEntryResult> {
  /** Number of elements the sequence will yield */
  readonly total: number;

  /** Directory record paths are resolved against */
  readonly workingDirectory: string;

  private readonly lines: readonly ManifestLine[];
  private readonly logger: Logger;
  private position = 0;
  private stopped = false;

  constructor(lines: readonly ManifestLine[], workingDirectory: string, logger: Logger) {
    this.lines = lines;
    this.workingDirectory = workingDirectory;
    this.logger = logger;
    this.total = lines.length;
  }

  /** Number of elements handed out so far */
  get consumed(): number {
    return this.position;
  }

  get state(): PipelineState {
    if (this.stopped || this.position >= this.total) return 'exhausted';
    return this.position === 0 ? 'created' : 'draining';
  }

  async next(): Promise<IteratorResult<ManifestEntryResult>> {
    if (this.stopped) {
      return { done: true, value: undefined };
    }

    const line = this.lines[this.position];
    if (line === undefined) {
      return { done: true, value: undefined };
    }
    // Claim the slot before awaiting so overlapping calls never share a record
    this.position++;

    if (!line.success) {
      this.logger.warn(
        { lineNumber: line.error.lineNumber, reason: line.error.message },
        'Skipping malformed manifest line'
      );
      return { done: false, value: { success: false, error: line.error } };
    }

    const { file, checksum } = line.record;
    // Absolute entries are used as written
    const filePath = path.resolve(this.workingDirectory, file);
    const result = await verifyChecksum(filePath, checksum);

    if (result.success) {
      this.logger.debug({ file, outcome: result.outcome.kind }, 'Verified file');
    } else {
      this.logger.warn({ file, code: result.error.code }, result.error.message);
    }

    return { done: false, value: { success: true, result: { file, result } } };
  }

  /**
   * Stop the sequence early. No further files are hashed.
   */
  async return(): Promise<IteratorResult<ManifestEntryResult>> {
    this.stopped = true;
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}
