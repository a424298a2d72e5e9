/**
 * export-prune library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the pipeline for programmatic use.
 */

export { pruneExport, type PruneReport, type PruneSettings } from './pipeline.js';
export * from './filters/index.js';
export * from './config/index.js';
export * from './errors.js';
export { EXPORT_FILES, DEFAULT_PASS_THROUGH, type PassThroughEntry } from './export/layout.js';
export { Logger, createLogger, logger, type LogLevel, type LoggerConfig } from './utils/logger.js';
export { pruneCommand, type PruneOptions } from './commands/index.js';
export { EXIT_CODES, type CommandResult, type CommandContext, type GlobalOptions } from './types.js';
