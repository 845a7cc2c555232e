/**
 * Aggregated artifact record of a module-set build.
 *
 * Collects the records of the module builds that ran as part of one
 * multi-module build. Deploying or installing the aggregate is left to the
 * caller, which can iterate `records`.
 */

import type { ArtifactRecord } from './artifact-record';
import { ModuleSetBuild } from '../domain/build';

export class AggregatedArtifactRecord {
  private readonly byModule: ReadonlyMap<string, readonly ArtifactRecord[]>;

  constructor(
    readonly moduleSet: ModuleSetBuild,
    moduleRecords: ReadonlyMap<string, readonly ArtifactRecord[]>,
    private readonly urlSegment: string,
  ) {
    const copy = new Map<string, readonly ArtifactRecord[]>();
    for (const [moduleName, records] of moduleRecords) {
      copy.set(moduleName, Object.freeze([...records]));
    }
    this.byModule = copy;
  }

  /** Module names in the order they were supplied. */
  get modules(): string[] {
    return [...this.byModule.keys()];
  }

  /** Records of one module, empty for an unknown module. */
  recordsOf(moduleName: string): readonly ArtifactRecord[] {
    return this.byModule.get(moduleName) ?? [];
  }

  /** Every record, module by module. */
  get records(): ArtifactRecord[] {
    return [...this.byModule.values()].flat();
  }

  get url(): string {
    return this.moduleSet.url + this.urlSegment;
  }
}
