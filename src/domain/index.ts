/**
 * Domain model exports.
 */

export * from './artifact';
export * from './build';
export * from './errors';
export * from './fingerprint';
export * from './toolchain';
