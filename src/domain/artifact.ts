/**
 * Build artifact value.
 *
 * One physical output of a build: the project descriptor (POM), the main
 * artifact (jar, war, ...) or an attached artifact (sources, javadoc, ...).
 * The value only knows where the file sits relative to its owning build's
 * archive; the physical path is resolved through the build when needed.
 */

/** Coordinates identifying an artifact in a repository. */
export interface ArtifactCoordinates {
  groupId: string;
  artifactId: string;
  version: string;
  /** Packaging type, e.g. "jar", "pom", "java-source". */
  type: string;
  classifier?: string;
}

/** An archived build output. Frozen on creation. */
export interface BuildArtifact extends ArtifactCoordinates {
  /** File name as the build produced it. */
  readonly fileName: string;
  /** Name the file is archived under: artifactId-version[-classifier].extension */
  readonly canonicalName: string;
  /** md5 of the file, captured when it was archived. */
  readonly md5sum?: string;
}

/** Input for creating a build artifact. */
export interface CreateBuildArtifactInput extends ArtifactCoordinates {
  fileName: string;
  md5sum?: string;
}

/** Logical location of an artifact inside its build's archive. */
export type ArtifactLocation = readonly [groupId: string, artifactId: string, version: string, canonicalName: string];

const DESCRIPTOR_FILE_NAME = 'pom.xml';
const DESCRIPTOR_EXTENSION = 'pom';

/** Extension an artifact is archived with, derived from the produced file name. */
export function archiveExtension(fileName: string): string {
  if (fileName === DESCRIPTOR_FILE_NAME || fileName.endsWith(`.${DESCRIPTOR_EXTENSION}`)) {
    return DESCRIPTOR_EXTENSION;
  }
  const dot = fileName.lastIndexOf('.');
  return dot >= 0 ? fileName.slice(dot + 1) : '';
}

/** Canonical archive name for a set of coordinates and an extension. */
export function canonicalNameOf(coords: ArtifactCoordinates, extension: string): string {
  const classifier = coords.classifier ? `-${coords.classifier}` : '';
  const suffix = extension ? `.${extension}` : '';
  return `${coords.artifactId}-${coords.version}${classifier}${suffix}`;
}

/** Create a frozen build artifact. Empty classifiers are dropped. */
export function createBuildArtifact(input: CreateBuildArtifactInput): BuildArtifact {
  const coords = coordinatesOf(input);
  return Object.freeze({
    ...coords,
    fileName: input.fileName,
    canonicalName: canonicalNameOf(coords, archiveExtension(input.fileName)),
    ...(input.md5sum ? { md5sum: input.md5sum } : {}),
  });
}

/** Plain coordinates of an artifact, without file details. */
export function coordinatesOf(coords: ArtifactCoordinates): ArtifactCoordinates {
  return {
    groupId: coords.groupId,
    artifactId: coords.artifactId,
    version: coords.version,
    type: coords.type,
    ...(coords.classifier ? { classifier: coords.classifier } : {}),
  };
}

/** Whether the artifact is a project descriptor (POM). */
export function isDescriptorArtifact(artifact: BuildArtifact): boolean {
  return artifact.fileName === DESCRIPTOR_FILE_NAME || artifact.fileName.endsWith(`.${DESCRIPTOR_EXTENSION}`);
}

/** Coordinate equality. File names and digests are not compared. */
export function sameCoordinates(a: ArtifactCoordinates, b: ArtifactCoordinates): boolean {
  return (
    a.groupId === b.groupId &&
    a.artifactId === b.artifactId &&
    a.version === b.version &&
    a.type === b.type &&
    (a.classifier ?? '') === (b.classifier ?? '')
  );
}

/** Location of the artifact relative to the owning build's archive root. */
export function artifactLocation(artifact: BuildArtifact): ArtifactLocation {
  return [artifact.groupId, artifact.artifactId, artifact.version, artifact.canonicalName];
}

/** `group:artifact:type[:classifier]:version`, for log lines. */
export function describeArtifact(coords: ArtifactCoordinates): string {
  const classifier = coords.classifier ? `:${coords.classifier}` : '';
  return `${coords.groupId}:${coords.artifactId}:${coords.type}${classifier}:${coords.version}`;
}
