/**
 * Build artifact tracker.
 *
 * Remembers which artifacts a CI build produced and redeploys or installs
 * them through an embedded package-management toolchain.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './record';
export * from './toolchain';
export * from './fingerprint';
export * from './storage';
export * from './tracker';
export { createArtifactRecordRoutes, parseDeployBody } from './api/artifact-records';
export type { ToolchainProvider } from './api/artifact-records';
export { errorHandler, getHttpStatus } from './api/middleware';
