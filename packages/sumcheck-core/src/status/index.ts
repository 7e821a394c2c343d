export {
  VERIFICATION_STATUSES,
  EXIT_CODES,
  severityOf,
  worseStatus,
  statusOfVerifyResult,
  statusOfEntry,
  reduceStatus,
  StatusTally,
} from './verification-status.js';
export type { VerificationStatus } from './verification-status.js';
