/**
 * Version-uniqueness reconciliation.
 *
 * A remote repository is configured either for unique (timestamped) or
 * non-unique snapshot versions. Only the legacy toolchain can deploy
 * non-unique versions; the modern one always deploys unique versions.
 *
 *   repository    mode     repository afterwards   deploys
 *   unique        any      forced unique           unique
 *   non-unique    modern   unchanged + diagnostic  unique
 *   non-unique    legacy   forced non-unique       non-unique
 */

import { RemoteRepository, TaskLog, ToolchainMode } from '../domain/toolchain';

export const NON_UNIQUE_UNSUPPORTED_MESSAGE =
  'uniqueVersion == false is not supported by toolchain 3.x and later; deploying with unique versions';

/**
 * Reconcile the repository's unique-version setting with the toolchain
 * mode. Mutates `repository.uniqueVersion` as shown in the table above and
 * returns whether unique versions will be deployed.
 */
export function reconcileUniqueVersion(repository: RemoteRepository, mode: ToolchainMode, log: TaskLog): boolean {
  if (repository.uniqueVersion) {
    repository.uniqueVersion = true;
    return true;
  }

  switch (mode) {
    case ToolchainMode.Modern:
      log.println(NON_UNIQUE_UNSUPPORTED_MESSAGE);
      return true;
    case ToolchainMode.Legacy:
      repository.uniqueVersion = false;
      return false;
    default: {
      const unknownMode: never = mode;
      throw new Error(`Unknown toolchain mode: ${String(unknownMode)}`);
    }
  }
}
