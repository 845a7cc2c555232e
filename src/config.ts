/**
 * Tracker configuration.
 *
 * Defaults, overridden by environment variables, overridden by explicit
 * values passed by the embedder:
 *
 *   const config = loadConfig(process.env, { port: 0 });
 *   const result = validateConfig(config);
 *   if (!result.valid) throw new Error(result.errors.join('; '));
 */

import * as os from 'os';
import * as path from 'path';
import { LogLevel, parseLogLevel } from './logger';
import { DEFAULT_QUALIFIER, MODERN_TOOLCHAIN_SINCE, compareToolchainVersions } from './domain/toolchain';

/** Settings used by ArtifactRecord operations. */
export interface RecordConfig {
  /** Deployer qualifier used when deploying unique versions. */
  defaultDeployerKey: string;
  /** Deployer qualifier of the legacy strategy for non-unique versions. */
  legacyDeployerKey: string;
  /** First toolchain version treated as modern. */
  modernToolchainSince: string;
  /** Path segment appended to a build URL for its artifact record. */
  urlSegment: string;
}

/** Complete tracker configuration. */
export interface TrackerConfig {
  port: number;
  /** Base directory of the local repository cache installs go to. */
  localRepository: string;
  logLevel: LogLevel;
  record: RecordConfig;
}

export const DEFAULT_RECORD_CONFIG: RecordConfig = {
  defaultDeployerKey: DEFAULT_QUALIFIER,
  legacyDeployerKey: 'maven2',
  modernToolchainSince: MODERN_TOOLCHAIN_SINCE,
  urlSegment: 'artifacts/',
};

export const DEFAULT_CONFIG: TrackerConfig = {
  port: 5000,
  localRepository: path.join(os.homedir(), '.m2', 'repository'),
  logLevel: LogLevel.Info,
  record: DEFAULT_RECORD_CONFIG,
};

/** Explicit overrides; `record` may be partial. */
export type TrackerConfigOverrides = Partial<Omit<TrackerConfig, 'record'>> & {
  record?: Partial<RecordConfig>;
};

/** Validation result for a configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

function fromEnv(env: NodeJS.ProcessEnv): TrackerConfigOverrides {
  const overrides: TrackerConfigOverrides = {};
  const record: Partial<RecordConfig> = {};

  if (env.PORT) overrides.port = parseInt(env.PORT, 10);
  if (env.TRACKER_LOCAL_REPOSITORY) overrides.localRepository = env.TRACKER_LOCAL_REPOSITORY;
  const logLevel = parseLogLevel(env.TRACKER_LOG_LEVEL);
  if (logLevel) overrides.logLevel = logLevel;
  if (env.TRACKER_LEGACY_DEPLOYER) record.legacyDeployerKey = env.TRACKER_LEGACY_DEPLOYER;
  if (env.TRACKER_MODERN_SINCE) record.modernToolchainSince = env.TRACKER_MODERN_SINCE;

  if (Object.keys(record).length > 0) overrides.record = record;
  return overrides;
}

/** Build the configuration from defaults, the environment and explicit overrides. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: TrackerConfigOverrides = {}): TrackerConfig {
  const envOverrides = fromEnv(env);
  return {
    ...DEFAULT_CONFIG,
    ...envOverrides,
    ...overrides,
    record: {
      ...DEFAULT_RECORD_CONFIG,
      ...envOverrides.record,
      ...overrides.record,
    },
  };
}

/** Check a configuration for values the tracker cannot work with. */
export function validateConfig(config: TrackerConfig): ConfigValidationResult {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push(`port must be an integer between 0 and 65535, got ${config.port}`);
  }
  if (!config.localRepository.trim()) {
    errors.push('localRepository must not be empty');
  }
  if (!config.record.urlSegment.endsWith('/')) {
    errors.push('record.urlSegment must end with "/"');
  }
  if (!config.record.defaultDeployerKey.trim()) {
    errors.push('record.defaultDeployerKey must not be empty');
  }
  if (!config.record.legacyDeployerKey.trim()) {
    errors.push('record.legacyDeployerKey must not be empty');
  }
  if (config.record.legacyDeployerKey === config.record.defaultDeployerKey) {
    errors.push('record.legacyDeployerKey must differ from record.defaultDeployerKey');
  }
  if (!/^\d+(\.\d+)*/.test(config.record.modernToolchainSince)) {
    errors.push(`record.modernToolchainSince is not a version: "${config.record.modernToolchainSince}"`);
  } else if (compareToolchainVersions(config.record.modernToolchainSince, '2') <= 0) {
    errors.push('record.modernToolchainSince must be later than 2');
  }

  return { valid: errors.length === 0, errors };
}
