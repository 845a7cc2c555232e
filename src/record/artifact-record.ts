/**
 * Artifact record: what one module build produced.
 *
 * Holds the descriptor (POM), the main artifact and the attached artifacts
 * of a single build, and redeploys or installs them on demand through the
 * toolchain the caller supplies.
 *
 * deploy() and install() are NOT atomic across the artifact set. Artifacts
 * are written one after another (main first, then attached artifacts in
 * build order) and the first failure is rethrown as is; whatever was written
 * before it stays written. Callers needing all-or-nothing semantics must
 * compensate themselves or rely on the repository overwriting on retry.
 */

import { BuildArtifact, coordinatesOf, describeArtifact, sameCoordinates } from '../domain/artifact';
import { ModuleSetBuild, OwningBuild } from '../domain/build';
import { TrackerError, invalidRecordError } from '../domain/errors';
import { FingerprintEntry, FingerprintRecorder } from '../domain/fingerprint';
import {
  ArtifactFactory,
  HandlerManager,
  RemoteRepository,
  TaskLog,
  Toolchain,
  resolveToolchainMode,
} from '../domain/toolchain';
import { DEFAULT_RECORD_CONFIG, RecordConfig } from '../config';
import { Logger, logger as rootLogger } from '../logger';
import { AggregatedArtifactRecord } from './aggregated-record';
import { ResolvedToolchainArtifact, recordArtifactFingerprint, resolveArtifactFile, toToolchainArtifact } from './artifact-resolver';
import { reconcileUniqueVersion } from './uniqueness';

/** Input for creating an artifact record. */
export interface ArtifactRecordInit {
  build: OwningBuild;
  descriptor: BuildArtifact;
  /** Omitted (or null) for a module that only produced its descriptor. */
  main?: BuildArtifact | null;
  attached?: readonly BuildArtifact[];
  fingerprints: FingerprintRecorder;
  config?: Partial<RecordConfig>;
}

/** Read-only view of a record, as served to API clients. */
export interface ArtifactRecordView {
  url: string;
  build: { id: string; number: number; moduleName: string };
  descriptorOnly: boolean;
  descriptor: BuildArtifact;
  main: BuildArtifact;
  attached: BuildArtifact[];
}

export class ArtifactRecord {
  readonly build: OwningBuild;
  readonly descriptor: BuildArtifact;
  /** Same object as `descriptor` when the module produced no binary. */
  readonly main: BuildArtifact;
  readonly attached: readonly BuildArtifact[];
  private readonly fingerprints: FingerprintRecorder;
  private readonly config: RecordConfig;
  private readonly logger: Logger;

  /** Throws RECORD.INVALID when the owning build or the descriptor is missing. */
  constructor(init: ArtifactRecordInit) {
    if (!init.build) {
      throw new TrackerError(invalidRecordError('Artifact record requires an owning build'));
    }
    if (!init.descriptor) {
      throw new TrackerError(
        invalidRecordError('Artifact record requires a descriptor artifact', { buildId: init.build.id }),
      );
    }
    this.build = init.build;
    this.descriptor = init.descriptor;
    this.main = init.main ?? init.descriptor;
    this.attached = Object.freeze([...(init.attached ?? [])]);
    this.fingerprints = init.fingerprints;
    this.config = { ...DEFAULT_RECORD_CONFIG, ...init.config };
    this.logger = rootLogger.child({ buildId: init.build.id, module: init.build.moduleName });
    Object.freeze(this);
  }

  /** True when the module produced only its descriptor. */
  isDescriptorOnly(): boolean {
    return sameCoordinates(this.main, this.descriptor);
  }

  /** URL of this record relative to the application root, ending with '/'. */
  get url(): string {
    return this.build.url + this.config.urlSegment;
  }

  /** Absolute URL, for remote API clients that cannot resolve relative references. */
  get absoluteUrl(): string {
    return this.build.absoluteUrl + this.config.urlSegment;
  }

  /**
   * Deploy the artifacts to a remote repository.
   *
   * Side effect: `repository.uniqueVersion` is forced to the value deployed
   * with, except for a non-unique repository under a modern toolchain, which
   * is left unchanged while unique versions are deployed (a diagnostic line
   * is written to `log`).
   */
  async deploy(toolchain: Toolchain, repository: RemoteRepository, log: TaskLog): Promise<void> {
    const handlerManager = toolchain.lookup('handler-manager');
    const factory = toolchain.lookup('artifact-factory');

    const mode = resolveToolchainMode(this.build.moduleSet.toolchainVersion, this.config.modernToolchainSince);
    const uniqueVersion = reconcileUniqueVersion(repository, mode, log);
    if (uniqueVersion !== repository.uniqueVersion) {
      this.logger.warn('Repository configured for non-unique versions; deploying unique versions', {
        repository: repository.id,
        mode,
      });
    }

    const main = await this.resolveMainArtifact(handlerManager, factory);

    const deployerKey = uniqueVersion ? this.config.defaultDeployerKey : this.config.legacyDeployerKey;
    const deployer = toolchain.lookup('deployer', deployerKey);
    const localRepository = toolchain.lookup('local-repository');

    this.logger.debug('Deploying artifact record', {
      repository: repository.id,
      mode,
      deployer: deployerKey,
      attached: this.attached.length,
    });

    // Deploying the main artifact also deploys the descriptor attached to it.
    log.println(`Deploying the main artifact ${main.fileName}`);
    await deployer.deploy(main.file, main.native, repository, localRepository);

    for (const artifact of this.attached) {
      const resolved = await toToolchainArtifact(artifact, handlerManager, factory, this.build);
      log.println(`Deploying the attached artifact ${resolved.fileName}`);
      await deployer.deploy(resolved.file, resolved.native, repository, localRepository);
    }
  }

  /** Install the artifacts into the local repository cache. */
  async install(toolchain: Toolchain): Promise<void> {
    const handlerManager = toolchain.lookup('handler-manager');
    const installer = toolchain.lookup('installer');
    const factory = toolchain.lookup('artifact-factory');
    const localRepository = toolchain.lookup('local-repository');

    const main = await this.resolveMainArtifact(handlerManager, factory);
    this.logger.debug('Installing artifact record', {
      localRepository: localRepository.basedir,
      attached: this.attached.length,
    });
    await installer.install(main.file, main.native, localRepository);

    for (const artifact of this.attached) {
      const resolved = await toToolchainArtifact(artifact, handlerManager, factory, this.build);
      await installer.install(resolved.file, resolved.native, localRepository);
    }
  }

  /** Record fingerprints of the main artifact, then of each attached artifact. */
  async recordFingerprints(): Promise<FingerprintEntry[]> {
    const entries: FingerprintEntry[] = [];
    for (const artifact of [this.main, ...this.attached]) {
      entries.push(await recordArtifactFingerprint(artifact, this.build, this.fingerprints));
      this.logger.debug('Recorded fingerprint', { artifact: describeArtifact(artifact) });
    }
    return entries;
  }

  /** Aggregate view over the records of every module of a module-set build. */
  createAggregatedView(
    moduleSet: ModuleSetBuild,
    moduleRecords: ReadonlyMap<string, readonly ArtifactRecord[]>,
  ): AggregatedArtifactRecord {
    return new AggregatedArtifactRecord(moduleSet, moduleRecords, this.config.urlSegment);
  }

  toExportedView(): ArtifactRecordView {
    return {
      url: this.absoluteUrl,
      build: { id: this.build.id, number: this.build.number, moduleName: this.build.moduleName },
      descriptorOnly: this.isDescriptorOnly(),
      descriptor: this.descriptor,
      main: this.main,
      attached: [...this.attached],
    };
  }

  /** Main artifact with the descriptor attached as metadata, unless they are the same artifact. */
  private async resolveMainArtifact(handlerManager: HandlerManager, factory: ArtifactFactory): Promise<ResolvedToolchainArtifact> {
    const main = await toToolchainArtifact(this.main, handlerManager, factory, this.build);
    if (!this.isDescriptorOnly()) {
      main.native.addMetadata({
        kind: 'project-descriptor',
        owner: coordinatesOf(main.native),
        file: await resolveArtifactFile(this.descriptor, this.build),
      });
    }
    return main;
  }
}
