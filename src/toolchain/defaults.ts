/**
 * Default toolchain assembly.
 */

import { CapabilityRegistry } from './capability-registry';
import { DefaultHandlerManager } from './handlers';
import { DefaultArtifactFactory } from './native-artifact';
import { LocalRepositoryHandle } from './repository';

/**
 * A registry with the standard handlers, the artifact factory and the local
 * repository. Deployers and installers talk to real repositories and are
 * registered by the embedding application:
 *
 *   createDefaultToolchain(config.localRepository)
 *     .register('deployer', httpDeployer)
 *     .register('deployer', legacyDeployer, config.record.legacyDeployerKey)
 *     .register('installer', fileInstaller);
 */
export function createDefaultToolchain(localRepository: string): CapabilityRegistry {
  const handlerManager = new DefaultHandlerManager();
  return new CapabilityRegistry()
    .register('handler-manager', handlerManager)
    .register('artifact-factory', new DefaultArtifactFactory(handlerManager))
    .register('local-repository', new LocalRepositoryHandle(localRepository));
}
