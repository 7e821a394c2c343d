/**
 * Manifest verification entry point.
 */

import { realpath } from 'node:fs/promises';
import * as path from 'node:path';
import { ManifestUnavailableError, errorMessage } from '../errors.js';
import { silentLogger } from '../logger.js';
import { ChecksumResults } from './checksum-results.js';
import { parseManifest } from './manifest-parser.js';
import type { VerifyManifestOptions } from './types.js';

/**
 * Build a lazy verification run for a manifest.
 *
 * The manifest path is canonicalized and its directory becomes the base
 * for every relative path it lists, so a manifest can be moved together
 * with its files. Nothing is hashed until the returned sequence is pulled.
 *
 * @example
 * ```ts
 * const results = await verifyManifest('release/checksums.md5');
 * for await (const entry of results) {
 *   // one digest computed per iteration
 * }
 * ```
 *
 * @throws ManifestUnavailableError if the manifest cannot be resolved or read
 */
export async function verifyManifest(
  manifestPath: string,
  options: VerifyManifestOptions = {}
): Promise<ChecksumResults> {
  const logger = options.logger ?? silentLogger;

  let canonicalPath: string;
  try {
    canonicalPath = await realpath(path.resolve(manifestPath));
  } catch (err) {
    throw new ManifestUnavailableError(
      manifestPath,
      `Unable to resolve manifest ${manifestPath}: ${errorMessage(err)}`,
      err
    );
  }

  const workingDirectory = path.dirname(canonicalPath);
  const lines = await parseManifest(canonicalPath);

  logger.debug(
    { manifestPath: canonicalPath, workingDirectory, total: lines.length },
    'Parsed manifest'
  );

  return new ChecksumResults(lines, workingDirectory, logger);
}
