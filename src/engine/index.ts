/**
 * Reconciliation engine exports.
 */

export * from './batch';
export * from './build-seeder';
export * from './priority-counter';
export * from './risk-ladder';
export * from './state-machine';
export * from './status-resolver';
export * from './track-reconciler';
