/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Artifact records
 * are immutable and stored by reference; fingerprint entries are plain data
 * and copied in and out so callers cannot alter stored state.
 */

import { FingerprintEntry } from '../domain/fingerprint';
import { TrackerError, duplicateRecordError } from '../domain/errors';
import { ArtifactRecord } from '../record/artifact-record';
import { FingerprintStore, ListOptions, RecordStore, Store } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryRecordStore implements RecordStore {
  private data = new Map<string, ArtifactRecord>();

  async create(record: ArtifactRecord): Promise<ArtifactRecord> {
    if (this.data.has(record.build.id)) {
      throw new TrackerError(duplicateRecordError(record.build.id));
    }
    this.data.set(record.build.id, record);
    return record;
  }

  async getByBuild(buildId: string): Promise<ArtifactRecord | null> {
    return this.data.get(buildId) ?? null;
  }

  async listByModuleSet(moduleSetId: string, options?: ListOptions): Promise<ArtifactRecord[]> {
    const items = [...this.data.values()].filter((r) => r.build.moduleSet.id === moduleSetId);
    return applyListOptions(items, options);
  }

  async deleteByBuild(buildId: string): Promise<boolean> {
    return this.data.delete(buildId);
  }
}

class MemoryFingerprintStore implements FingerprintStore {
  /** Keyed by build id and path. */
  private data = new Map<string, FingerprintEntry>();

  async upsert(entry: FingerprintEntry): Promise<FingerprintEntry> {
    const key = `${entry.buildId}\u0000${entry.path}`;
    // Re-inserting moves the entry to the end, keeping recording order.
    this.data.delete(key);
    this.data.set(key, deepCopy(entry));
    return deepCopy(entry);
  }

  async listByBuild(buildId: string, options?: ListOptions): Promise<FingerprintEntry[]> {
    const items = [...this.data.values()].filter((e) => e.buildId === buildId);
    return applyListOptions(items.map(deepCopy), options);
  }

  async listByDigest(digest: string, options?: ListOptions): Promise<FingerprintEntry[]> {
    const items = [...this.data.values()].filter((e) => e.digest === digest);
    return applyListOptions(items.map(deepCopy), options);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    records: new MemoryRecordStore(),
    fingerprints: new MemoryFingerprintStore(),
  };
}
