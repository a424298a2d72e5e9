/**
 * Prune pipeline
 *
 * Runs every filter stage in dependency order, threading keep-sets from each
 * stage into the ones that depend on it:
 *
 *   clusters → acl_clusters, jobs → acl_jobs
 *   instance_profiles
 *   groups → users, directories → workspace_objects → acl_notebooks
 *                               → acl_directories, libraries
 *   groups → artifacts
 *   pass_through
 *
 * A failing stage is recorded and yields an empty keep-set; the run continues.
 * The only fatal condition is a missing source root.
 */

import { mkdirSync } from 'node:fs';
import { SourceNotFoundError, StageFailedError } from './errors.js';
import { isDirectory } from './export/files.js';
import {
  EMPTY_KEEP_SET,
  copyPassThrough,
  pruneArtifacts,
  pruneClusterAcls,
  pruneClusters,
  pruneDirectories,
  pruneDirectoryAcls,
  pruneGroups,
  pruneInstanceProfiles,
  pruneJobAcls,
  pruneJobs,
  pruneLibraries,
  pruneObjectAcls,
  pruneUsers,
  pruneWorkspaceObjects,
  type DirectoryKeepSets,
  type KeepSets,
  type StageContext,
  type StageName,
  type StageOutcome,
  type StageReport,
} from './filters/index.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Fully resolved settings for one run
 */
export interface PruneSettings {
  /** Root of the export to prune */
  sourcePath: string;
  /** Root of the pruned copy */
  targetPath: string;
  /** Team tags selecting what to keep */
  tags: readonly string[];
  /** Replace existing destination files instead of skipping them */
  overwrite: boolean;
  /** Leave metastore exports out of the pass-through copy */
  skipMetastore: boolean;
  /** Do not copy artifact subtrees */
  skipArtifacts: boolean;
  /** Additional pass-through entries beyond the defaults */
  passThrough: readonly string[];
}

export interface PruneReport {
  sourcePath: string;
  targetPath: string;
  tags: readonly string[];
  overwrite: boolean;
  /** One entry per stage that ran, in execution order */
  stages: StageReport[];
  /** Size of each keep-set at the end of the run */
  keepSets: Record<keyof KeepSets, number>;
  failedStages: StageName[];
  warningCount: number;
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Prepare the destination root. Existing destinations are reused; each stage
 * decides on its own whether to skip or overwrite its output.
 */
function prepareDestination(settings: PruneSettings, log: Logger): void {
  log.info('Checking for existing destination folder...');
  if (isDirectory(settings.targetPath)) {
    log.info(
      settings.overwrite
        ? 'Existing destination path found; overwriting existing files.'
        : 'Existing destination path found; will skip existing files.'
    );
    return;
  }
  log.info('Destination path not found. Creating...');
  mkdirSync(settings.targetPath, { recursive: true });
}

export function pruneExport(settings: PruneSettings, log: Logger = defaultLogger): PruneReport {
  if (!isDirectory(settings.sourcePath)) {
    throw new SourceNotFoundError(settings.sourcePath);
  }

  prepareDestination(settings, log);

  const ctx: StageContext = {
    sourceRoot: settings.sourcePath,
    targetRoot: settings.targetPath,
    tags: settings.tags,
    overwrite: settings.overwrite,
    logger: log,
  };

  const stages: StageReport[] = [];

  function runStage<T>(stage: StageName, label: string, fallback: T, run: () => StageOutcome<T>): T {
    log.info(`Pruning ${label}...`);
    try {
      const { report, result } = run();
      stages.push(report);
      return result;
    } catch (err) {
      const failure = new StageFailedError(stage, err);
      log.error(failure.message, err instanceof Error ? err : undefined, { stage });
      stages.push({ stage, status: 'failed', output: '', read: 0, kept: 0, warnings: [failure.message] });
      return fallback;
    }
  }

  const noDirectories: DirectoryKeepSets = { dirs: EMPTY_KEEP_SET, dirIds: EMPTY_KEEP_SET };

  // clusters & jobs
  const clusters = runStage('clusters', 'clusters', EMPTY_KEEP_SET, () => pruneClusters(ctx));
  runStage('acl_clusters', 'cluster ACLs', 0, () => pruneClusterAcls(ctx, clusters));
  const jobs = runStage('jobs', 'jobs', EMPTY_KEEP_SET, () => pruneJobs(ctx, clusters));
  runStage('acl_jobs', 'job ACLs', 0, () => pruneJobAcls(ctx, jobs));

  // instance profiles
  runStage('instance_profiles', 'instance profiles', 0, () => pruneInstanceProfiles(ctx));

  // groups & users
  const users = runStage('groups', 'groups', EMPTY_KEEP_SET, () => pruneGroups(ctx));
  runStage('users', 'users', 0, () => pruneUsers(ctx, users));

  // workspace metadata
  const directories = runStage('directories', 'workspace directories', noDirectories, () =>
    pruneDirectories(ctx, users)
  );
  const objectIds = runStage('workspace_objects', 'workspace objects', EMPTY_KEEP_SET, () =>
    pruneWorkspaceObjects(ctx, directories.dirs)
  );
  runStage('acl_directories', 'directory ACLs', 0, () => pruneDirectoryAcls(ctx, directories.dirIds));
  runStage('acl_notebooks', 'notebook ACLs', 0, () => pruneObjectAcls(ctx, objectIds));
  runStage('libraries', 'libraries', 0, () => pruneLibraries(ctx, directories.dirs));

  // artifacts
  if (settings.skipArtifacts) {
    log.info('Skipping artifacts (--skip-artifacts)');
  } else {
    runStage('artifacts', 'artifacts', [], () => pruneArtifacts(ctx, users));
  }

  // everything with no tag relationship
  runStage('pass_through', 'additional resources', {}, () =>
    copyPassThrough(ctx, { skipMetastore: settings.skipMetastore, extra: settings.passThrough })
  );

  log.info('Finished pruning resources.');

  return {
    sourcePath: settings.sourcePath,
    targetPath: settings.targetPath,
    tags: settings.tags,
    overwrite: settings.overwrite,
    stages,
    keepSets: {
      clusters: clusters.size,
      jobs: jobs.size,
      users: users.size,
      dirs: directories.dirs.size,
      dirIds: directories.dirIds.size,
      objectIds: objectIds.size,
    },
    failedStages: stages.filter((s) => s.status === 'failed').map((s) => s.stage),
    warningCount: stages.reduce((total, s) => total + s.warnings.length, 0),
  };
}
