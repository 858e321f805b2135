/**
 * services/index.ts
 * Barrel export for the planner utility services.
 */

export { FileService, FileReadError } from './file-service.js';
export { SourceScanner, DEFAULT_SOURCE_INCLUDES } from './source-scanner.js';
export type { SourceScanOptions } from './source-scanner.js';
export { PlanValidator, ValidationError } from './plan-validator.js';
export { PlanExporter } from './plan-exporter.js';
export { loadPlannerConfig } from './config-loader.js';
export { ConsoleLogger, FileLogger, TeeLogger, SilentLogger, formatLogLine } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
