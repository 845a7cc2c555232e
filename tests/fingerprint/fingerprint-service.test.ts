import * as fs from 'fs/promises';
import * as path from 'path';
import { OwningBuild } from '../../src/domain/build';
import { FingerprintService } from '../../src/fingerprint/fingerprint-service';
import { createMemoryStore } from '../../src/storage/memory-store';
import { createTempDir, createTestBuild, removeTempDir } from '../helpers/fixtures';

describe('FingerprintService', () => {
  let dir: string;
  let build: OwningBuild;
  let service: FingerprintService;

  beforeEach(async () => {
    dir = await createTempDir();
    build = createTestBuild(dir);
    service = new FingerprintService(createMemoryStore().fingerprints);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function file(name: string, content: string): Promise<string> {
    const target = path.join(dir, name);
    await fs.writeFile(target, content);
    return target;
  }

  it('records the md5 of the file against the build', async () => {
    const jar = await file('core-1.0.jar', 'hello');

    const entry = await service.record(jar, build);

    expect(entry.id).toMatch(/^fp_[0-9a-f-]{36}$/);
    expect(entry).toMatchObject({
      digest: '5d41402abc4b2a76b9719d911017c592',
      fileName: 'core-1.0.jar',
      path: jar,
      buildId: 'build_1',
      buildNumber: 7,
      moduleSetId: 'set_1',
    });
    expect(Number.isNaN(Date.parse(entry.recordedAt))).toBe(false);
  });

  it('lists entries by build in recording order', async () => {
    const jar = await file('core-1.0.jar', 'hello');
    const pom = await file('core-1.0.pom', '<project/>');

    await service.record(jar, build);
    await service.record(pom, build);

    const entries = await service.listByBuild('build_1');
    expect(entries.map((e) => e.fileName)).toEqual(['core-1.0.jar', 'core-1.0.pom']);
  });

  it('replaces the entry when the same file is recorded again', async () => {
    const jar = await file('core-1.0.jar', 'hello');
    await service.record(jar, build);
    await fs.writeFile(jar, 'hello again');

    await service.record(jar, build);

    const entries = await service.listByBuild('build_1');
    expect(entries).toHaveLength(1);
    expect(entries[0].digest).not.toBe('5d41402abc4b2a76b9719d911017c592');
  });

  it('finds every build that recorded the same content', async () => {
    const jar = await file('core-1.0.jar', 'hello');
    const copy = await file('copy.jar', 'hello');

    await service.record(jar, build);
    await service.record(copy, { ...build, id: 'build_2', number: 8 });

    const usages = await service.findUsages('5d41402abc4b2a76b9719d911017c592');
    expect(usages.map((u) => [u.buildId, u.fileName])).toEqual([
      ['build_1', 'core-1.0.jar'],
      ['build_2', 'copy.jar'],
    ]);
  });

  it('propagates read errors', async () => {
    await expect(service.record(path.join(dir, 'missing.jar'), build)).rejects.toThrow('ENOENT');
    await expect(service.listByBuild('build_1')).resolves.toEqual([]);
  });
});
