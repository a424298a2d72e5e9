#!/usr/bin/env node
/**
 * export-prune CLI - Prune a workspace export down to selected teams
 *
 * Reads a static export tree and writes a copy containing only the clusters,
 * jobs, groups, users, workspace objects, libraries, ACLs and artifacts that
 * belong to the given team tags.
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext } from './types.js';
import { EXIT_CODES } from './types.js';
import { pruneCommand } from './commands/index.js';
import { printResult, error } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    cwd: process.cwd(),
  };
}

const program = new Command()
  .name('export-prune')
  .description('Prune exported workspace resources using team tags')
  .version(VERSION)
  .addOption(new Option('--source-path <dir>', 'The folder containing the exported resources to be pruned'))
  .addOption(new Option('--target-path <dir>', 'The folder to write the pruned resources to'))
  .addOption(new Option('--tags <tags...>', 'The tag(s) defining which clusters and resources to keep'))
  .addOption(new Option('--overwrite', 'Overwrite existing files in the target folder'))
  .addOption(new Option('--skip-metastore', 'Do not copy metastore exports'))
  .addOption(new Option('--skip-artifacts', 'Do not copy user and team artifacts'))
  .addOption(new Option('--config <file>', 'YAML config file (default: .export-prune.yaml)'))
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false))
  .action(() => {
    const globalOpts = program.opts() as GlobalOptions;
    const ctx = createContext(globalOpts);

    try {
      const result = pruneCommand(ctx);

      if (ctx.outputFormat === 'json') {
        printResult(result, ctx.outputFormat);
      }

      process.exit(result.exitCode);
    } catch (err) {
      error(`Prune failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(EXIT_CODES.failure);
    }
  });

// Parse and execute
program.parse();
