/**
 * Fingerprint service.
 *
 * Computes the md5 of an archived file and records it against the build,
 * so the same file can later be traced to every build that produced or
 * consumed it.
 */

import * as path from 'path';
import { v4 as uuid } from 'uuid';
import { OwningBuild } from '../domain/build';
import { FingerprintEntry, FingerprintRecorder } from '../domain/fingerprint';
import { md5OfFile } from '../record/capture';
import { FingerprintStore } from '../storage/store';
import { logger } from '../logger';

export class FingerprintService implements FingerprintRecorder {
  private log = logger.child({ service: 'fingerprints' });

  constructor(private store: FingerprintStore) {}

  /** Hash the file and persist the entry. Read errors propagate. */
  async record(file: string, build: OwningBuild): Promise<FingerprintEntry> {
    const digest = await md5OfFile(file);
    const entry: FingerprintEntry = {
      id: `fp_${uuid()}`,
      digest,
      fileName: path.basename(file),
      path: file,
      buildId: build.id,
      buildNumber: build.number,
      moduleSetId: build.moduleSet.id,
      recordedAt: new Date().toISOString(),
    };
    const stored = await this.store.upsert(entry);
    this.log.debug('Fingerprint recorded', { buildId: build.id, fileName: entry.fileName, digest });
    return stored;
  }

  /** Entries recorded for a build. */
  async listByBuild(buildId: string): Promise<FingerprintEntry[]> {
    return this.store.listByBuild(buildId);
  }

  /** Every build a file with this digest was recorded for. */
  async findUsages(digest: string): Promise<FingerprintEntry[]> {
    return this.store.listByDigest(digest);
  }
}
