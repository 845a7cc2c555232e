/**
 * Owning build contracts.
 *
 * The build engine is external. The tracker only needs a build to map an
 * artifact's logical location to a file and to report which toolchain
 * version ran it.
 */

import { ArtifactLocation } from './artifact';

/** The multi-module build a module build belongs to. */
export interface ModuleSetBuild {
  id: string;
  /** URL relative to the application root, ending with '/'. */
  url: string;
  /** Version of the toolchain used for the build, e.g. "3.0.4". Blank when unknown. */
  toolchainVersion?: string;
}

/** A single module build owning an artifact record. */
export interface OwningBuild {
  id: string;
  number: number;
  /** Module the build belongs to, e.g. "org.example:core". */
  moduleName: string;
  /** URL relative to the application root, ending with '/'. */
  url: string;
  /** Absolute URL, for remote API clients only. */
  absoluteUrl: string;
  moduleSet: ModuleSetBuild;
  /** Map a location inside the build's archive to a physical path. */
  resolveArtifactPath(location: ArtifactLocation): string;
}
