/**
 * External service clients.
 */

export * from './addon';
export * from './charmhub';
export * from './command';
export * from './http';
export * from './snapstore';
export * from './sqa';
export * from './upstream-releases';
