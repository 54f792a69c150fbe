/**
 * Main export file for library consumers
 * Provides the compose parsing, validation and generation API plus its types
 */

export * from './compose/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './domain/types/compose.js';
export { Success, Failure, type Result } from './domain/types/result.js';
export { createLogger, createTimer, type Logger, type Timer } from './lib/logger.js';
export { createProgram } from './cli/program.js';
