/**
 * Operations on a single archived artifact.
 *
 * Physical files are only ever reached through the owning build, so a
 * record stays valid if the build's archive moves.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { BuildArtifact, archiveExtension, artifactLocation } from '../domain/artifact';
import { OwningBuild } from '../domain/build';
import { TrackerError, artifactMissingError, isFileNotFound } from '../domain/errors';
import { FingerprintEntry, FingerprintRecorder } from '../domain/fingerprint';
import { ArtifactFactory, HandlerManager, ToolchainArtifact } from '../domain/toolchain';

/** A toolchain-native artifact together with the archived file it was given. */
export interface ResolvedToolchainArtifact {
  native: ToolchainArtifact;
  file: string;
  fileName: string;
}

/** Resolve the archived file of an artifact, failing with ARTIFACT.MISSING if it is gone. */
export async function resolveArtifactFile(artifact: BuildArtifact, build: OwningBuild): Promise<string> {
  const file = build.resolveArtifactPath(artifactLocation(artifact));
  try {
    const stat = await fs.stat(file);
    if (stat.isFile()) return file;
  } catch (err) {
    if (!isFileNotFound(err)) throw err;
  }
  throw new TrackerError(artifactMissingError(file, build.id));
}

/**
 * Build the toolchain-native artifact for an archived artifact.
 *
 * A custom handler active during the build may have produced a file whose
 * extension differs from the handler's default. In that case a handler
 * carrying the archived extension is registered first, so the repository
 * layout matches what was archived.
 */
export async function toToolchainArtifact(
  artifact: BuildArtifact,
  handlerManager: HandlerManager,
  factory: ArtifactFactory,
  build: OwningBuild,
): Promise<ResolvedToolchainArtifact> {
  const canonicalExtension = archiveExtension(artifact.canonicalName);
  const handler = handlerManager.getArtifactHandler(artifact.type);
  if (!artifact.canonicalName.endsWith(handler.extension)) {
    handlerManager.addHandlers({ [artifact.type]: { ...handler, extension: canonicalExtension } });
  }

  const native = factory.createArtifactWithClassifier(
    artifact.groupId,
    artifact.artifactId,
    artifact.version,
    artifact.type,
    artifact.classifier,
  );
  const file = await resolveArtifactFile(artifact, build);
  native.setFile(file);
  return { native, file, fileName: path.basename(file) };
}

/** Hand the artifact's archived file to the fingerprint subsystem. */
export async function recordArtifactFingerprint(
  artifact: BuildArtifact,
  build: OwningBuild,
  recorder: FingerprintRecorder,
): Promise<FingerprintEntry> {
  const file = await resolveArtifactFile(artifact, build);
  return recorder.record(file, build);
}
