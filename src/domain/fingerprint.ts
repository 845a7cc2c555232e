/**
 * Fingerprint domain model.
 *
 * A fingerprint ties the content hash of an archived file to the build that
 * produced or used it, so the same file can be traced across builds.
 */

import { OwningBuild } from './build';

/** A recorded content hash. */
export interface FingerprintEntry {
  id: string;
  /** Hex md5 of the file content. */
  digest: string;
  fileName: string;
  /** Physical path the digest was computed from. */
  path: string;
  buildId: string;
  buildNumber: number;
  moduleSetId: string;
  recordedAt: string;
}

/** The fingerprint subsystem, as seen by artifact records. */
export interface FingerprintRecorder {
  record(file: string, build: OwningBuild): Promise<FingerprintEntry>;
}
