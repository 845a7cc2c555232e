/**
 * Reference toolchain component exports.
 */

export * from './capability-registry';
export * from './defaults';
export * from './handlers';
export * from './native-artifact';
export * from './repository';
export * from './task-log';
