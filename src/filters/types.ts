/**
 * Types shared by the filter stages
 */

import type { Logger } from '../utils/logger.js';

/**
 * Stage names, in pipeline order
 */
export const STAGE_NAMES = [
  'clusters',
  'acl_clusters',
  'jobs',
  'acl_jobs',
  'instance_profiles',
  'groups',
  'users',
  'directories',
  'workspace_objects',
  'acl_directories',
  'acl_notebooks',
  'libraries',
  'artifacts',
  'pass_through',
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/**
 * - filtered: input was read and the output written this run
 * - skipped: output already existed; its contents were used as-is
 * - missing-source: input file absent; nothing written
 * - failed: unexpected error inside the stage
 */
export type StageStatus = 'filtered' | 'skipped' | 'missing-source' | 'failed';

export interface StageReport {
  stage: StageName;
  status: StageStatus;
  /** Destination path relative to the target root */
  output: string;
  /** Records (or entries) examined */
  read: number;
  /** Records (or entries) present in the output after the stage */
  kept: number;
  warnings: string[];
}

/**
 * Everything a stage needs besides upstream keep-sets
 */
export interface StageContext {
  sourceRoot: string;
  targetRoot: string;
  tags: readonly string[];
  overwrite: boolean;
  logger: Logger;
}

/**
 * A stage's report plus whatever it hands to downstream stages
 */
export interface StageOutcome<T> {
  report: StageReport;
  result: T;
}

/**
 * Keep-sets flowing between stages. Computed once, never mutated.
 */
export interface KeepSets {
  clusters: ReadonlySet<string>;
  jobs: ReadonlySet<string>;
  users: ReadonlySet<string>;
  /** Full paths of kept user and team directories */
  dirs: ReadonlySet<string>;
  /** `object_id`s of the directories in `dirs` */
  dirIds: ReadonlySet<string>;
  objectIds: ReadonlySet<string>;
}

export const EMPTY_KEEP_SET: ReadonlySet<string> = new Set<string>();
