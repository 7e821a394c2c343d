// Digest engine
export {
  DIGEST_ALGORITHM,
  DIGEST_HEX_LENGTH,
  computeDigest,
  hashFile,
  verifyChecksum,
  describeDigestProblem,
} from './digest/index.js';

export type {
  DigestAlgorithm,
  Outcome,
  OutcomeMatch,
  OutcomeMismatch,
  HashFailure,
  VerifySuccess,
  VerifyFailure,
  VerifyResult,
} from './digest/index.js';

// Manifest pipeline
export {
  ChecksumResults,
  verifyManifest,
  parseManifest,
  parseManifestBytes,
  parseManifestContent,
  parseManifestLine,
} from './manifest/index.js';

export type {
  ChecksumRecord,
  ChecksumResult,
  ParseFailure,
  ManifestLine,
  ManifestLineRecord,
  ManifestLineFailure,
  ManifestEntryResult,
  ManifestEntryChecked,
  ManifestEntryUnparsed,
  PipelineState,
  VerifyManifestOptions,
} from './manifest/index.js';

// Status
export {
  VERIFICATION_STATUSES,
  EXIT_CODES,
  severityOf,
  worseStatus,
  statusOfVerifyResult,
  statusOfEntry,
  reduceStatus,
  StatusTally,
} from './status/index.js';

export type { VerificationStatus } from './status/index.js';

// Errors, config, logging
export {
  ManifestUnavailableError,
  FileUnreadableError,
  errorCode,
  errorMessage,
} from './errors.js';

export {
  LOG_LEVELS,
  DEFAULT_CONFIG,
  buildConfig,
  isLogLevel,
} from './config.js';

export type { SumcheckConfig } from './config.js';

export { LOGGER_NAME, createLogger, silentLogger } from './logger.js';
