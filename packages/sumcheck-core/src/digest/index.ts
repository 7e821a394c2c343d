export {
  DIGEST_ALGORITHM,
  DIGEST_HEX_LENGTH,
  computeDigest,
  hashFile,
  verifyChecksum,
  describeDigestProblem,
} from './digest-engine.js';
export type {
  DigestAlgorithm,
  Outcome,
  OutcomeMatch,
  OutcomeMismatch,
  HashFailure,
  VerifySuccess,
  VerifyFailure,
  VerifyResult,
} from './types.js';
