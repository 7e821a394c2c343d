export { ChecksumResults } from './checksum-results.js';
export { verifyManifest } from './manifest-verifier.js';
export {
  parseManifest,
  parseManifestBytes,
  parseManifestContent,
  parseManifestLine,
} from './manifest-parser.js';
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
} from './types.js';
