import {
  archiveExtension,
  artifactLocation,
  canonicalNameOf,
  coordinatesOf,
  createBuildArtifact,
  describeArtifact,
  isDescriptorArtifact,
  sameCoordinates,
} from '../../src/domain/artifact';

const coords = { groupId: 'org.example', artifactId: 'core', version: '1.0' };

describe('archiveExtension', () => {
  test('maps descriptor files to pom', () => {
    expect(archiveExtension('pom.xml')).toBe('pom');
    expect(archiveExtension('core-1.0.pom')).toBe('pom');
  });

  test('uses the text after the last dot', () => {
    expect(archiveExtension('core-1.0.jar')).toBe('jar');
    expect(archiveExtension('dist-1.0.tar.gz')).toBe('gz');
    expect(archiveExtension('README')).toBe('');
  });
});

describe('createBuildArtifact', () => {
  test('derives the canonical name from coordinates and file extension', () => {
    const artifact = createBuildArtifact({ ...coords, type: 'jar', fileName: 'target-output.jar' });
    expect(artifact.canonicalName).toBe('core-1.0.jar');
    expect(artifact.fileName).toBe('target-output.jar');
  });

  test('includes the classifier in the canonical name', () => {
    const artifact = createBuildArtifact({ ...coords, type: 'java-source', classifier: 'sources', fileName: 'core-1.0-sources.jar' });
    expect(artifact.canonicalName).toBe('core-1.0-sources.jar');
  });

  test('names a pom.xml descriptor with the pom extension', () => {
    const artifact = createBuildArtifact({ ...coords, type: 'pom', fileName: 'pom.xml' });
    expect(artifact.canonicalName).toBe('core-1.0.pom');
    expect(isDescriptorArtifact(artifact)).toBe(true);
  });

  test('drops an empty classifier and an absent md5', () => {
    const artifact = createBuildArtifact({ ...coords, type: 'jar', classifier: '', fileName: 'core-1.0.jar' });
    expect('classifier' in artifact).toBe(false);
    expect('md5sum' in artifact).toBe(false);
  });

  test('keeps the md5 it was given', () => {
    const artifact = createBuildArtifact({ ...coords, type: 'jar', fileName: 'core-1.0.jar', md5sum: '5d41402abc4b2a76b9719d911017c592' });
    expect(artifact.md5sum).toBe('5d41402abc4b2a76b9719d911017c592');
  });

  test('returns a frozen value', () => {
    const artifact = createBuildArtifact({ ...coords, type: 'jar', fileName: 'core-1.0.jar' });
    expect(Object.isFrozen(artifact)).toBe(true);
  });
});

describe('canonicalNameOf', () => {
  test('omits the dot when there is no extension', () => {
    expect(canonicalNameOf({ ...coords, type: 'bin' }, '')).toBe('core-1.0');
  });
});

describe('coordinates', () => {
  test('coordinatesOf strips file details', () => {
    const artifact = createBuildArtifact({ ...coords, type: 'jar', classifier: 'tests', fileName: 'core-1.0-tests.jar' });
    expect(coordinatesOf(artifact)).toEqual({ ...coords, type: 'jar', classifier: 'tests' });
  });

  test('sameCoordinates ignores file names and digests', () => {
    const a = createBuildArtifact({ ...coords, type: 'jar', fileName: 'a.jar', md5sum: 'aaaa' });
    const b = createBuildArtifact({ ...coords, type: 'jar', fileName: 'b.jar' });
    expect(sameCoordinates(a, b)).toBe(true);
  });

  test('sameCoordinates treats a missing and an empty classifier alike', () => {
    expect(sameCoordinates({ ...coords, type: 'jar' }, { ...coords, type: 'jar', classifier: '' })).toBe(true);
  });

  test('sameCoordinates compares every coordinate', () => {
    const base = { ...coords, type: 'jar' };
    expect(sameCoordinates(base, { ...base, groupId: 'org.other' })).toBe(false);
    expect(sameCoordinates(base, { ...base, artifactId: 'api' })).toBe(false);
    expect(sameCoordinates(base, { ...base, version: '1.1' })).toBe(false);
    expect(sameCoordinates(base, { ...base, type: 'pom' })).toBe(false);
    expect(sameCoordinates(base, { ...base, classifier: 'sources' })).toBe(false);
  });

  test('isDescriptorArtifact is false for binaries', () => {
    expect(isDescriptorArtifact(createBuildArtifact({ ...coords, type: 'jar', fileName: 'core-1.0.jar' }))).toBe(false);
  });
});

describe('artifactLocation and describeArtifact', () => {
  test('locates the artifact by group, artifact, version and canonical name', () => {
    const artifact = createBuildArtifact({ ...coords, type: 'javadoc', classifier: 'javadoc', fileName: 'core-1.0-javadoc.jar' });
    expect(artifactLocation(artifact)).toEqual(['org.example', 'core', '1.0', 'core-1.0-javadoc.jar']);
  });

  test('describes coordinates for log lines', () => {
    expect(describeArtifact({ ...coords, type: 'jar' })).toBe('org.example:core:jar:1.0');
    expect(describeArtifact({ ...coords, type: 'java-source', classifier: 'sources' })).toBe('org.example:core:java-source:sources:1.0');
  });
});
