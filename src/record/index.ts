/**
 * Artifact record exports.
 */

export * from './aggregated-record';
export * from './artifact-record';
export * from './artifact-resolver';
export * from './capture';
export * from './uniqueness';
