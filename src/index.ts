/**
 * Wall Panel Optimizer
 *
 * Main entry point for the library
 */

// Export all geometry types
export * from './types';

// Export geometry utilities
export * from './geometry';

// Export layout algorithm
export * from './algorithm';

// Export input/output boundary
export * from './io';

// Export logger utility
export { Logger, LogLevel, parseLogLevel, enableDebugLogging, disableLogging } from './algorithm/utils/logger';
export type { LogSink } from './algorithm/utils/logger';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'Wall Panel Optimizer';
