/**
 * Shared fixtures: a build archiving into a temporary directory, artifacts
 * of one module, and recording fakes for the toolchain collaborators.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { BuildArtifact, artifactLocation, createBuildArtifact } from '../../src/domain/artifact';
import { OwningBuild } from '../../src/domain/build';
import { FingerprintEntry, FingerprintRecorder } from '../../src/domain/fingerprint';
import {
  Deployer,
  Installer,
  LocalRepository,
  RemoteRepository,
  TaskLog,
  ToolchainArtifact,
} from '../../src/domain/toolchain';
import { CapabilityRegistry } from '../../src/toolchain/capability-registry';
import { DefaultHandlerManager } from '../../src/toolchain/handlers';
import { DefaultArtifactFactory } from '../../src/toolchain/native-artifact';
import { LocalRepositoryHandle } from '../../src/toolchain/repository';

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'artifact-tracker-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function createTestBuild(archiveRoot: string, overrides: Partial<OwningBuild> = {}): OwningBuild {
  return {
    id: 'build_1',
    number: 7,
    moduleName: 'org.example:core',
    url: 'job/app/org.example$core/7/',
    absoluteUrl: 'http://ci.example.test/job/app/org.example$core/7/',
    moduleSet: { id: 'set_1', url: 'job/app/7/', toolchainVersion: '3.0.4' },
    resolveArtifactPath: (location) => path.join(archiveRoot, ...location),
    ...overrides,
  };
}

/** Build with a given toolchain version. */
export function withToolchainVersion(build: OwningBuild, toolchainVersion: string | undefined): OwningBuild {
  return { ...build, moduleSet: { ...build.moduleSet, toolchainVersion } };
}

const COORDS = { groupId: 'org.example', artifactId: 'core', version: '1.0-SNAPSHOT' };

export const descriptorArtifact: BuildArtifact = createBuildArtifact({ ...COORDS, type: 'pom', fileName: 'pom.xml' });
export const mainArtifact: BuildArtifact = createBuildArtifact({ ...COORDS, type: 'jar', fileName: 'core-1.0-SNAPSHOT.jar' });
export const sourcesArtifact: BuildArtifact = createBuildArtifact({
  ...COORDS,
  type: 'java-source',
  classifier: 'sources',
  fileName: 'core-1.0-SNAPSHOT-sources.jar',
});
export const javadocArtifact: BuildArtifact = createBuildArtifact({
  ...COORDS,
  type: 'javadoc',
  classifier: 'javadoc',
  fileName: 'core-1.0-SNAPSHOT-javadoc.jar',
});
export const testsArtifact: BuildArtifact = createBuildArtifact({
  ...COORDS,
  type: 'test-jar',
  classifier: 'tests',
  fileName: 'core-1.0-SNAPSHOT-tests.jar',
});

/** Write an artifact's file into the build archive. Returns the path. */
export async function writeArchived(build: OwningBuild, artifact: BuildArtifact, content: string = artifact.canonicalName): Promise<string> {
  const file = build.resolveArtifactPath(artifactLocation(artifact));
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
  return file;
}

export interface DeployCall {
  fileName: string;
  file: string;
  artifact: ToolchainArtifact;
  repository: RemoteRepository;
  localRepository: LocalRepository;
}

/** Deployer remembering each call; fails on the call number given to `failOnCall`. */
export class RecordingDeployer implements Deployer {
  calls: DeployCall[] = [];
  failOnCall?: number;
  failure = new Error('Repository rejected the artifact');

  async deploy(file: string, artifact: ToolchainArtifact, repository: RemoteRepository, localRepository: LocalRepository): Promise<void> {
    this.calls.push({ fileName: path.basename(file), file, artifact, repository, localRepository });
    if (this.failOnCall === this.calls.length) throw this.failure;
  }
}

export interface InstallCall {
  fileName: string;
  artifact: ToolchainArtifact;
  localRepository: LocalRepository;
}

export class RecordingInstaller implements Installer {
  calls: InstallCall[] = [];
  failOnCall?: number;
  failure = new Error('Local repository is read-only');

  async install(file: string, artifact: ToolchainArtifact, localRepository: LocalRepository): Promise<void> {
    this.calls.push({ fileName: path.basename(file), artifact, localRepository });
    if (this.failOnCall === this.calls.length) throw this.failure;
  }
}

/** Fingerprint recorder remembering file names; fails on the call number given. */
export class RecordingFingerprints implements FingerprintRecorder {
  files: string[] = [];
  failOnCall?: number;
  failure = new Error('EIO: i/o error, read');

  async record(file: string, build: OwningBuild): Promise<FingerprintEntry> {
    this.files.push(path.basename(file));
    if (this.failOnCall === this.files.length) throw this.failure;
    return {
      id: `fp_${this.files.length}`,
      digest: 'd41d8cd98f00b204e9800998ecf8427e',
      fileName: path.basename(file),
      path: file,
      buildId: build.id,
      buildNumber: build.number,
      moduleSetId: build.moduleSet.id,
      recordedAt: '2026-01-01T00:00:00.000Z',
    };
  }
}

export class LinesLog implements TaskLog {
  lines: string[] = [];

  println(line: string): void {
    this.lines.push(line);
  }
}

export interface TestToolchain {
  toolchain: CapabilityRegistry;
  defaultDeployer: RecordingDeployer;
  legacyDeployer: RecordingDeployer;
  installer: RecordingInstaller;
  localRepository: LocalRepositoryHandle;
}

/** Registry with the standard handlers and recording deployers under "default" and "maven2". */
export function createTestToolchain(): TestToolchain {
  const handlerManager = new DefaultHandlerManager();
  const defaultDeployer = new RecordingDeployer();
  const legacyDeployer = new RecordingDeployer();
  const installer = new RecordingInstaller();
  const localRepository = new LocalRepositoryHandle('/tmp/local-repository');
  const toolchain = new CapabilityRegistry()
    .register('handler-manager', handlerManager)
    .register('artifact-factory', new DefaultArtifactFactory(handlerManager))
    .register('deployer', defaultDeployer)
    .register('deployer', legacyDeployer, 'maven2')
    .register('installer', installer)
    .register('local-repository', localRepository);
  return { toolchain, defaultDeployer, legacyDeployer, installer, localRepository };
}
