/**
 * Storage layer interfaces.
 *
 * Defines the contract for persistence with pluggable backends. An artifact
 * record lives exactly as long as the build it belongs to: there is no way
 * to delete a record other than deleting it together with its build.
 */

import { FingerprintEntry } from '../domain/fingerprint';
import { ArtifactRecord } from '../record/artifact-record';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for artifact records, one per build. */
export interface RecordStore {
  /** Rejects with RECORD.DUPLICATE when the build already has a record. */
  create(record: ArtifactRecord): Promise<ArtifactRecord>;
  getByBuild(buildId: string): Promise<ArtifactRecord | null>;
  /** Records of every module build of a module-set build, in creation order. */
  listByModuleSet(moduleSetId: string, options?: ListOptions): Promise<ArtifactRecord[]>;
  /** Called when the build itself is deleted. */
  deleteByBuild(buildId: string): Promise<boolean>;
}

/** Store interface for fingerprints. */
export interface FingerprintStore {
  /** Insert, or replace the entry for the same build and path. */
  upsert(entry: FingerprintEntry): Promise<FingerprintEntry>;
  listByBuild(buildId: string, options?: ListOptions): Promise<FingerprintEntry[]>;
  listByDigest(digest: string, options?: ListOptions): Promise<FingerprintEntry[]>;
}

/** Composite store interface. */
export interface Store {
  records: RecordStore;
  fingerprints: FingerprintStore;
}
