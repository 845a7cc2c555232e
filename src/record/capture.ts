/**
 * Capturing build outputs into the build's archive.
 *
 * The build engine reports each file the toolchain produced; the ones that
 * are real files are turned into BuildArtifact values (with their md5) and
 * copied to the location the record will later resolve them from.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ArtifactCoordinates, BuildArtifact, artifactLocation, createBuildArtifact } from '../domain/artifact';
import { OwningBuild } from '../domain/build';
import { isFileNotFound } from '../domain/errors';

/** An output as the toolchain reported it during the build. */
export interface ProducedArtifact extends ArtifactCoordinates {
  /** Produced file. Undefined when the build left no file (e.g. it failed). */
  file?: string;
}

/** Stream a file through md5 and return the hex digest. */
export function md5OfFile(file: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('md5');
    createReadStream(file)
      .on('error', reject)
      .on('data', (chunk) => hash.update(chunk))
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Turn a produced output into a BuildArtifact. Returns null when there is
 * no file, or when the "file" is a directory (during a build the toolchain
 * can point a module at its class folder instead of a jar).
 */
export async function captureArtifact(output: ProducedArtifact): Promise<BuildArtifact | null> {
  if (!output.file) return null;
  const stat = await fs.stat(output.file).catch((err: unknown) => {
    if (isFileNotFound(err)) return null;
    throw err;
  });
  if (!stat || !stat.isFile()) return null;

  return createBuildArtifact({
    groupId: output.groupId,
    artifactId: output.artifactId,
    version: output.version,
    type: output.type,
    classifier: output.classifier,
    fileName: path.basename(output.file),
    md5sum: await md5OfFile(output.file),
  });
}

/** Copy a produced file into the build's archive. Returns the archived path. */
export async function archiveArtifact(artifact: BuildArtifact, sourceFile: string, build: OwningBuild): Promise<string> {
  const target = build.resolveArtifactPath(artifactLocation(artifact));
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.copyFile(sourceFile, target);
  return target;
}
