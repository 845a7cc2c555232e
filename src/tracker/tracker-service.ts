/**
 * Artifact tracker service.
 *
 * Entry point used by the build engine and the API: records what a build
 * produced, and runs deploy, install and fingerprinting against the stored
 * record of a build.
 */

import { BuildArtifact } from '../domain/artifact';
import { ModuleSetBuild, OwningBuild } from '../domain/build';
import { TrackerError, notFoundError } from '../domain/errors';
import { FingerprintEntry, FingerprintRecorder } from '../domain/fingerprint';
import { RemoteRepository, TaskLog, Toolchain } from '../domain/toolchain';
import { DEFAULT_RECORD_CONFIG, RecordConfig } from '../config';
import { logger } from '../logger';
import { AggregatedArtifactRecord } from '../record/aggregated-record';
import { ArtifactRecord } from '../record/artifact-record';
import { RecordStore } from '../storage/store';

/** What a module build produced, as reported by the build engine. */
export interface RecordBuildInput {
  build: OwningBuild;
  descriptor: BuildArtifact;
  main?: BuildArtifact | null;
  attached?: readonly BuildArtifact[];
}

/** Tracker options. */
export interface TrackerOptions {
  /** Record fingerprints as soon as a build is recorded. Defaults to true. */
  fingerprintOnRecord: boolean;
  record: Partial<RecordConfig>;
}

/** Page size used when reading every record of a module set. */
const AGGREGATE_PAGE_SIZE = 100;

const DEFAULT_OPTIONS: TrackerOptions = {
  fingerprintOnRecord: true,
  record: {},
};

export class ArtifactTracker {
  private options: TrackerOptions;
  private log = logger.child({ service: 'tracker' });

  constructor(
    private records: RecordStore,
    private fingerprints: FingerprintRecorder,
    options?: Partial<TrackerOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** Create and store the record of a finished build. */
  async recordBuild(input: RecordBuildInput): Promise<ArtifactRecord> {
    const record = new ArtifactRecord({
      build: input.build,
      descriptor: input.descriptor,
      main: input.main,
      attached: input.attached,
      fingerprints: this.fingerprints,
      config: this.options.record,
    });
    await this.records.create(record);
    this.log.info('Artifact record created', {
      buildId: input.build.id,
      descriptorOnly: record.isDescriptorOnly(),
      attached: record.attached.length,
    });

    if (this.options.fingerprintOnRecord) {
      await record.recordFingerprints();
    }
    return record;
  }

  /** The record of a build; throws VALIDATION.NOT_FOUND when there is none. */
  async getRecord(buildId: string): Promise<ArtifactRecord> {
    const record = await this.records.getByBuild(buildId);
    if (!record) {
      throw new TrackerError(notFoundError('Artifact record', buildId));
    }
    return record;
  }

  async deploy(buildId: string, toolchain: Toolchain, repository: RemoteRepository, log: TaskLog): Promise<void> {
    const record = await this.getRecord(buildId);
    await record.deploy(toolchain, repository, log);
    this.log.info('Artifact record deployed', { buildId, repository: repository.id });
  }

  async install(buildId: string, toolchain: Toolchain): Promise<void> {
    const record = await this.getRecord(buildId);
    await record.install(toolchain);
    this.log.info('Artifact record installed', { buildId });
  }

  async recordFingerprints(buildId: string): Promise<FingerprintEntry[]> {
    const record = await this.getRecord(buildId);
    return record.recordFingerprints();
  }

  /** Aggregate the records of every module build of a module-set build. */
  async aggregate(moduleSet: ModuleSetBuild): Promise<AggregatedArtifactRecord> {
    const records = await this.listAllByModuleSet(moduleSet.id);
    const byModule = new Map<string, ArtifactRecord[]>();
    for (const record of records) {
      const list = byModule.get(record.build.moduleName) ?? [];
      list.push(record);
      byModule.set(record.build.moduleName, list);
    }
    if (records.length === 0) {
      return new AggregatedArtifactRecord(moduleSet, byModule, this.urlSegment());
    }
    return records[0].createAggregatedView(moduleSet, byModule);
  }

  /** Drop the record together with its build. */
  async deleteBuild(buildId: string): Promise<boolean> {
    return this.records.deleteByBuild(buildId);
  }

  private async listAllByModuleSet(moduleSetId: string): Promise<ArtifactRecord[]> {
    const records: ArtifactRecord[] = [];
    for (;;) {
      const page = await this.records.listByModuleSet(moduleSetId, { offset: records.length, limit: AGGREGATE_PAGE_SIZE });
      records.push(...page);
      if (page.length < AGGREGATE_PAGE_SIZE) return records;
    }
  }

  private urlSegment(): string {
    return this.options.record.urlSegment ?? DEFAULT_RECORD_CONFIG.urlSegment;
  }
}
