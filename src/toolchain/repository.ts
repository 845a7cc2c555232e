/**
 * Repository handles.
 */

import { maskUrlCredentials } from '../domain/errors';
import { LocalRepository, RemoteRepository } from '../domain/toolchain';

/** Input for a remote repository handle. */
export interface RemoteRepositoryInput {
  id: string;
  url: string;
  /** Defaults to true. */
  uniqueVersion?: boolean;
}

/**
 * A remote repository whose unique-version setting can be forced by a
 * deploy. `configuredUniqueVersion` keeps the value it was created with.
 */
export class ConfigurableRemoteRepository implements RemoteRepository {
  readonly id: string;
  readonly url: string;
  readonly configuredUniqueVersion: boolean;
  uniqueVersion: boolean;

  constructor(input: RemoteRepositoryInput) {
    this.id = input.id;
    this.url = input.url;
    this.configuredUniqueVersion = input.uniqueVersion ?? true;
    this.uniqueVersion = this.configuredUniqueVersion;
  }

  /** JSON view with credentials in the URL masked. */
  toJSON(): { id: string; url: string; uniqueVersion: boolean } {
    return { id: this.id, url: maskUrlCredentials(this.url), uniqueVersion: this.uniqueVersion };
  }
}

export class LocalRepositoryHandle implements LocalRepository {
  constructor(readonly basedir: string, readonly id: string = 'local') {}
}
