/**
 * Domain model exports.
 */

export * from './bundle';
export * from './channel';
export * from './errors';
export * from './revision-matrix';
export * from './test-status';
export * from './track-state';
