/**
 * prune command - Filter an export down to the selected teams
 */

import type { CommandContext, CommandResult } from '../types.js';
import { EXIT_CODES } from '../types.js';
import { formatSources, resolveSettings, type SettingsResolutionResult } from '../config/index.js';
import { SourceNotFoundError, formatError, isPruneError } from '../errors.js';
import { pruneExport, type PruneReport } from '../pipeline.js';
import { createLogger, logger as defaultLogger, type Logger } from '../utils/logger.js';
import { error as printError, header, info, printReport, success, verbose, warn } from '../utils/output.js';

export interface PruneOptions {
  /** Logger for the pipeline transcript (defaults to one derived from the context) */
  logger?: Logger;
}

/**
 * Pick a transcript logger for the output mode. JSON mode keeps stdout for the
 * result document, so only warnings and errors (stderr) are logged, verbose
 * or not.
 */
function createRunLogger(ctx: CommandContext): Logger {
  const base = defaultLogger.getConfig();
  if (ctx.outputFormat === 'json') {
    return createLogger({ ...base, level: 'warn' });
  }
  if (ctx.options.verbose) {
    return createLogger({ ...base, level: 'debug' });
  }
  return createLogger(base);
}

export function pruneCommand(ctx: CommandContext, options: PruneOptions = {}): CommandResult<PruneReport> {
  const { options: globalOpts, outputFormat } = ctx;
  const human = outputFormat === 'human';

  let resolution: SettingsResolutionResult;
  try {
    resolution = resolveSettings({
      cliSource: globalOpts.sourcePath,
      cliTarget: globalOpts.targetPath,
      cliTags: globalOpts.tags,
      cliOverwrite: globalOpts.overwrite,
      cliSkipMetastore: globalOpts.skipMetastore,
      cliSkipArtifacts: globalOpts.skipArtifacts,
      configPath: globalOpts.config,
      cwd: ctx.cwd,
    });
  } catch (err) {
    const message = formatError(err);
    if (human) printError(message);
    return { success: false, message, exitCode: EXIT_CODES.failure };
  }

  verbose(`Settings resolved from: ${formatSources(resolution)}`, globalOpts.verbose);

  const { settings } = resolution;
  if (!settings) {
    const message = resolution.error ?? 'Could not resolve run settings';
    if (human) printError(message);
    return { success: false, message, exitCode: EXIT_CODES.failure };
  }

  if (human) {
    header('Export Prune');
    info(`Keeping resources for ${settings.tags.join(', ')}`);
  }
  verbose(`Source: ${settings.sourcePath}`, globalOpts.verbose);
  verbose(`Target: ${settings.targetPath}`, globalOpts.verbose);
  verbose(`Tags: ${settings.tags.join(', ')}`, globalOpts.verbose);

  let report: PruneReport;
  try {
    report = pruneExport(settings, options.logger ?? createRunLogger(ctx));
  } catch (err) {
    const message = isPruneError(err) ? err.message : formatError(err);
    if (human) printError(formatError(err));
    return {
      success: false,
      message,
      exitCode: err instanceof SourceNotFoundError ? EXIT_CODES.sourceNotFound : EXIT_CODES.failure,
    };
  }

  const errors = report.stages
    .filter((stage) => stage.status === 'failed')
    .flatMap((stage) => stage.warnings);

  if (human) {
    printReport(report);
    if (errors.length > 0) {
      warn(`${errors.length} stage(s) failed; see the log above`);
    }
    success(`Pruned export written to ${settings.targetPath}`);
  }

  return {
    success: true,
    message: `Pruned export for ${settings.tags.join(', ')} written to ${settings.targetPath}`,
    data: report,
    errors: errors.length > 0 ? errors : undefined,
    exitCode: EXIT_CODES.success,
  };
}
