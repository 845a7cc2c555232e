/**
 * Storage exports.
 */

export * from './store';
export * from './memory-store';
