/**
 * Capability registry, an in-process Toolchain.
 *
 * Embedders register the toolchain components they have (handler manager,
 * artifact factory, deployers per strategy key, installer, local repository)
 * and hand the registry to ArtifactRecord operations.
 */

import { TrackerError, toolchainLookupError } from '../domain/errors';
import { Capability, CapabilityMap, DEFAULT_QUALIFIER, Toolchain } from '../domain/toolchain';

type Registrations = { [C in Capability]: Map<string, CapabilityMap[C]> };

export class CapabilityRegistry implements Toolchain {
  private registrations: Registrations = {
    'handler-manager': new Map(),
    'artifact-factory': new Map(),
    deployer: new Map(),
    installer: new Map(),
    'local-repository': new Map(),
  };

  /** Register an implementation. A later registration replaces an earlier one. */
  register<C extends Capability>(capability: C, implementation: CapabilityMap[C], qualifier: string = DEFAULT_QUALIFIER): this {
    this.registrations[capability].set(qualifier, implementation);
    return this;
  }

  /** Whether a capability is registered under the qualifier. */
  has(capability: Capability, qualifier: string = DEFAULT_QUALIFIER): boolean {
    return this.registrations[capability].has(qualifier);
  }

  lookup<C extends Capability>(capability: C, qualifier: string = DEFAULT_QUALIFIER): CapabilityMap[C] {
    const implementation = this.registrations[capability].get(qualifier);
    if (implementation === undefined) {
      throw new TrackerError(toolchainLookupError(capability, qualifier));
    }
    return implementation;
  }
}
