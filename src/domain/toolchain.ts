/**
 * Toolchain collaborator contracts.
 *
 * The package-management toolchain (artifact factories, deployers,
 * installers, repositories) lives outside the tracker. Everything the
 * tracker needs from it is looked up by capability, so tests and embedders
 * can supply their own implementations.
 */

import { ArtifactCoordinates } from './artifact';

/** Describes how a packaging type maps onto files in a repository. */
export interface ArtifactHandler {
  type: string;
  /** File extension used in the repository layout. */
  extension: string;
  classifier?: string;
  packaging: string;
}

/** Descriptor file attached to a main artifact so it is deployed alongside it. */
export interface DescriptorMetadata {
  kind: 'project-descriptor';
  /** Coordinates of the artifact the descriptor describes. */
  owner: ArtifactCoordinates;
  file: string;
}

export type ArtifactMetadata = DescriptorMetadata;

/** Toolchain-native artifact object handed to deployers and installers. */
export interface ToolchainArtifact extends ArtifactCoordinates {
  readonly file: string | undefined;
  readonly metadata: readonly ArtifactMetadata[];
  setFile(file: string): void;
  addMetadata(metadata: ArtifactMetadata): void;
}

export interface HandlerManager {
  getArtifactHandler(type: string): ArtifactHandler;
  /** Register or override handlers by type. */
  addHandlers(handlers: Record<string, ArtifactHandler>): void;
}

export interface ArtifactFactory {
  createArtifactWithClassifier(
    groupId: string,
    artifactId: string,
    version: string,
    type: string,
    classifier?: string,
  ): ToolchainArtifact;
}

/**
 * Remote repository handle.
 *
 * `uniqueVersion` is read AND written by ArtifactRecord.deploy(): the deploy
 * operation forces the setting to the value it deploys with, so callers
 * must not assume the handle is unchanged after a deploy.
 */
export interface RemoteRepository {
  readonly id: string;
  readonly url: string;
  uniqueVersion: boolean;
}

/** The local repository cache. */
export interface LocalRepository {
  readonly id: string;
  readonly basedir: string;
}

export interface Deployer {
  deploy(file: string, artifact: ToolchainArtifact, repository: RemoteRepository, localRepository: LocalRepository): Promise<void>;
}

export interface Installer {
  install(file: string, artifact: ToolchainArtifact, localRepository: LocalRepository): Promise<void>;
}

/** Capabilities a toolchain can be asked for. */
export interface CapabilityMap {
  'handler-manager': HandlerManager;
  'artifact-factory': ArtifactFactory;
  deployer: Deployer;
  installer: Installer;
  'local-repository': LocalRepository;
}

export type Capability = keyof CapabilityMap;

/** Qualifier used when a lookup does not name one. */
export const DEFAULT_QUALIFIER = 'default';

/**
 * The embedded toolchain.
 * `lookup` throws (TOOLCHAIN.LOOKUP) when the capability is not available.
 */
export interface Toolchain {
  lookup<C extends Capability>(capability: C, qualifier?: string): CapabilityMap[C];
}

/** Ordered, line-oriented log of the build step running the operation. */
export interface TaskLog {
  println(line: string): void;
}

/** Toolchain major-version families with different deploy behaviour. */
export enum ToolchainMode {
  /** 2.x: supports non-unique (non-timestamped) snapshot versions. */
  Legacy = 'legacy',
  /** 3.x and later: always deploys unique versions. */
  Modern = 'modern',
}

/** First version treated as modern. */
export const MODERN_TOOLCHAIN_SINCE = '3.0';

interface ParsedVersion {
  numbers: number[];
  qualifier: string;
}

function parseVersion(version: string): ParsedVersion {
  const trimmed = version.trim();
  const dash = trimmed.indexOf('-');
  const numeric = dash >= 0 ? trimmed.slice(0, dash) : trimmed;
  const qualifier = dash >= 0 ? trimmed.slice(dash + 1) : '';
  const numbers = numeric.split('.').map((part) => {
    const n = parseInt(part, 10);
    return Number.isNaN(n) ? 0 : n;
  });
  return { numbers, qualifier };
}

/**
 * Compare two toolchain versions. Numeric segments compare numerically with
 * missing segments as 0; on a tie a qualified version ("3.0-beta-1",
 * "3.0-SNAPSHOT") sorts before the release.
 */
export function compareToolchainVersions(a: string, b: string): number {
  const pa = parseVersion(a);
  const pb = parseVersion(b);
  const length = Math.max(pa.numbers.length, pb.numbers.length);
  for (let i = 0; i < length; i++) {
    const diff = (pa.numbers[i] ?? 0) - (pb.numbers[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  if (pa.qualifier === pb.qualifier) return 0;
  if (!pa.qualifier) return 1;
  if (!pb.qualifier) return -1;
  return pa.qualifier < pb.qualifier ? -1 : 1;
}

/** Mode for the toolchain version a build used. Unknown versions are legacy. */
export function resolveToolchainMode(version: string | undefined, modernSince: string = MODERN_TOOLCHAIN_SINCE): ToolchainMode {
  if (!version || version.trim() === '') return ToolchainMode.Legacy;
  return compareToolchainVersions(version, modernSince) >= 0 ? ToolchainMode.Modern : ToolchainMode.Legacy;
}
