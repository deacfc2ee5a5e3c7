export * from './builder.js';
export * from './config.js';
export * from './context.js';
export * from './docker-builder.js';
export * from './docker-client.js';
export * from './errors.js';
export * from './executor.js';
export * from './fingerprint.js';
export * from './graph.js';
export * from './http.js';
export * from './linearizer.js';
export { configureLogging, createLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LoggingOptions, LogLevel } from './logger.js';
export * from './manifest.js';
export * from './orchestrator.js';
export * from './planner.js';
export * from './record-store.js';
export * from './registry.js';
export * from './report.js';
export { VERSION } from './version.js';
export type * from './types/index.js';
