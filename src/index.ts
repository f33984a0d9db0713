/**
 * Release Reconciler: candidate/stable promotion for charm bundles and
 * time-based risk-ladder promotion for snaps.
 *
 * Library entry point. The command-line interface lives in ./cli.
 */

export * from './domain';
export * from './engine';
export * from './clients';
export { SeedStateStore } from './storage/seed-state-store';
export type { SeedRecord, SeedState } from './storage/seed-state-store';
export { loadConfig } from './config';
export type { ReleaseConfig } from './config';
export { createLogger, logger, setLogHandler, resetLogHandler, setLogLevel, LogLevel } from './logger';
export type { Logger, LogEntry, LogHandler } from './logger';
