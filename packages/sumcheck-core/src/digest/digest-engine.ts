/**
 * Digest engine.
 *
 * Computes MD5 digests of buffers and files and compares a file's digest
 * with an expected value. Files are streamed through the hash, so memory
 * use does not grow with file size.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import { FileUnreadableError, errorCode, errorMessage } from '../errors.js';
import type { DigestAlgorithm, VerifyResult } from './types.js';

export const DIGEST_ALGORITHM: DigestAlgorithm = 'md5';

/** Length of a hex-encoded MD5 digest */
export const DIGEST_HEX_LENGTH = 32;

const DIGEST_PATTERN = /^[0-9a-f]{32}$/;

/**
 * Compute the lowercase hex digest of in-memory content.
 */
export function computeDigest(content: Buffer | string): string {
  return crypto.createHash(DIGEST_ALGORITHM).update(content).digest('hex');
}

/**
 * Compute the digest of a file using a streaming read.
 *
 * @param filePath - Path to the file
 * @returns Lowercase hex digest
 * @throws FileUnreadableError if the file cannot be opened or fully read
 */
export async function hashFile(filePath: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const hash = crypto.createHash(DIGEST_ALGORITHM);
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve(hash.digest('hex'));
    });

    // autoClose releases the descriptor on both 'end' and 'error'
    stream.on('error', (err: Error) => {
      reject(
        new FileUnreadableError(
          filePath,
          `Failed to read ${filePath}: ${err.message}`,
          errorCode(err),
          err
        )
      );
    });
  });
}

/**
 * Verify a file against an expected digest.
 *
 * The comparison is case-sensitive: `expectedDigest` must already be
 * lowercase hex. Never rejects for I/O problems; an unreadable file is
 * reported as `{ success: false, error }`.
 *
 * @param filePath - Path to the file to hash
 * @param expectedDigest - Lowercase hex digest the file should have
 */
export async function verifyChecksum(
  filePath: string,
  expectedDigest: string
): Promise<VerifyResult> {
  let actual: string;
  try {
    actual = await hashFile(filePath);
  } catch (err) {
    return {
      success: false,
      error: {
        kind: 'hash-failure',
        path: filePath,
        message: errorMessage(err),
        code: err instanceof FileUnreadableError ? err.code : errorCode(err),
      },
    };
  }

  if (actual === expectedDigest) {
    return { success: true, outcome: { kind: 'match' } };
  }

  return {
    success: true,
    outcome: { kind: 'mismatch', expected: expectedDigest, actual },
  };
}

/**
 * Check that a digest string is in the form manifests use.
 * Returns a description of the problem, or null if the digest looks right.
 */
export function describeDigestProblem(digest: string): string | null {
  if (digest.length === 0) {
    return 'digest is empty';
  }
  if (DIGEST_PATTERN.test(digest)) {
    return null;
  }
  if (DIGEST_PATTERN.test(digest.toLowerCase())) {
    return 'digest contains uppercase characters; comparison is case-sensitive';
  }
  if (digest.length !== DIGEST_HEX_LENGTH) {
    return `digest must be ${DIGEST_HEX_LENGTH} hex characters (got ${digest.length})`;
  }
  return 'digest contains non-hex characters';
}
