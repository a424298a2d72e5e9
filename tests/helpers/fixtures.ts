/**
 * Shared fixtures for export-prune tests
 *
 * Builds small export trees in a temp directory.
 */

import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { Logger } from '../../src/utils/logger.js';
import type { StageContext } from '../../src/filters/types.js';

export function createTempDir(prefix = 'export-prune-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * A logger that prints nothing below error level
 */
export function silentLogger(): Logger {
  return new Logger({ level: 'error', timestamps: false });
}

export function writeFile(root: string, relative: string, content: string): void {
  const path = join(root, relative);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf-8');
}

/**
 * Write records as a line-delimited export file
 */
export function writeRecords(root: string, relative: string, records: readonly unknown[]): void {
  writeFile(root, relative, records.map((r) => `${JSON.stringify(r)}\n`).join(''));
}

export function readFile(root: string, relative: string): string {
  return readFileSync(join(root, relative), 'utf-8');
}

/**
 * Parse a line-delimited output file back into objects
 */
export function readRecords(root: string, relative: string): Record<string, unknown>[] {
  return readFile(root, relative)
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => JSON.parse(line));
}

export function stageContext(
  sourceRoot: string,
  targetRoot: string,
  tags: readonly string[],
  overwrite = false
): StageContext {
  return { sourceRoot, targetRoot, tags, overwrite, logger: silentLogger() };
}

// =============================================================================
// Sample export
// =============================================================================

export const ALPHA_CLUSTER = { cluster_id: '0101-alpha', cluster_name: 'alpha-etl', custom_tags: { z_team: 'team_alpha' } };
export const BETA_CLUSTER = { cluster_id: '0102-beta', cluster_name: 'beta-etl', custom_tags: { z_team: 'team_beta' } };
export const UNTAGGED_CLUSTER = { cluster_id: '0103-none', cluster_name: 'scratch' };
export const OTHER_TAGS_CLUSTER = { cluster_id: '0104-misc', custom_tags: { owner: 'ops' } };

/**
 * Write a small but complete export tree covering every stage
 */
export function writeSampleExport(root: string): void {
  writeRecords(root, 'clusters.log', [ALPHA_CLUSTER, BETA_CLUSTER, UNTAGGED_CLUSTER, OTHER_TAGS_CLUSTER]);
  writeRecords(root, 'acl_clusters.log', [
    { object_id: '/clusters/0101-alpha', access_control_list: [{ group_name: 'team-alpha-admins' }] },
    { object_id: '/clusters/0102-beta', access_control_list: [] },
  ]);

  writeRecords(root, 'jobs.log', [
    { job_id: 11, settings: { name: 'alpha-nightly', existing_cluster_id: '0101-alpha' } },
    { job_id: 12, settings: { name: 'beta-nightly', existing_cluster_id: '0102-beta' } },
    { job_id: 13, settings: { name: 'alpha-adhoc', new_cluster: { custom_tags: { z_team: 'team_alpha' } } } },
    { job_id: 14, settings: { name: 'beta-adhoc', new_cluster: { custom_tags: { z_team: 'team_beta' } } } },
    { job_id: 15, settings: { name: 'orphan' } },
  ]);
  writeRecords(root, 'acl_jobs.log', [
    { object_id: '/jobs/11' },
    { object_id: '/jobs/12' },
    { object_id: '/jobs/13' },
  ]);

  writeRecords(root, 'instance_profiles.log', [
    { instance_profile_arn: 'arn:aws:iam::123456789012:instance-profile/team-alpha-s3' },
    { instance_profile_arn: 'arn:aws:iam::123456789012:instance-profile/team-beta-s3' },
  ]);

  writeFile(
    root,
    'groups/team-alpha-admins.json',
    JSON.stringify({ displayName: 'team-alpha-admins', members: [{ userName: 'alice@example.com' }, { userName: 'bob@example.com' }] })
  );
  writeFile(
    root,
    'groups/team-beta-users.json',
    JSON.stringify({ displayName: 'team-beta-users', members: [{ userName: 'carol@example.com' }] })
  );

  writeRecords(root, 'users.log', [
    { id: '1', userName: 'alice@example.com' },
    { id: '2', userName: 'bob@example.com' },
    { id: '3', userName: 'carol@example.com' },
  ]);

  writeRecords(root, 'user_dirs.log', [
    { object_type: 'DIRECTORY', path: '/Shared', object_id: 100 },
    { object_type: 'DIRECTORY', path: '/Users/alice@example.com', object_id: 101 },
    { object_type: 'DIRECTORY', path: '/Users/alice@example.com/etl', object_id: 102 },
    { object_type: 'DIRECTORY', path: '/Users/carol@example.com', object_id: 103 },
    { object_type: 'DIRECTORY', path: '/Workspace/teams/alpha/notebook_dir', object_id: 104 },
    { object_type: 'DIRECTORY', path: '/teams/beta/reports', object_id: 105 },
    { object_type: 'DIRECTORY', path: '/Repos/alice@example.com/project', object_id: 106 },
  ]);

  writeRecords(root, 'user_workspace.log', [
    { object_type: 'NOTEBOOK', path: '/Users/alice@example.com/etl/ingest', object_id: 201 },
    { object_type: 'NOTEBOOK', path: '/Users/carol@example.com/scratch', object_id: 202 },
    { object_type: 'NOTEBOOK', path: '/Workspace/teams/alpha/notebook_dir/nb1', object_id: 203 },
    { object_type: 'NOTEBOOK', path: '/teams/beta/reports/weekly', object_id: 204 },
    { object_type: 'NOTEBOOK', path: '/Shared/readme', object_id: 205 },
  ]);

  writeRecords(root, 'acl_directories.log', [
    { object_id: '/directories/101' },
    { object_id: '/directories/103' },
    { object_id: '/directories/104' },
  ]);

  writeRecords(root, 'acl_notebooks.log', [
    { object_id: '/notebooks/201' },
    { object_id: '/notebooks/202' },
    { object_id: '/notebooks/203' },
  ]);

  writeRecords(root, 'libraries.log', [
    { path: '/Users/alice@example.com/etl/utils-lib', object_type: 'LIBRARY' },
    { path: '/teams/beta/reports/beta-lib', object_type: 'LIBRARY' },
  ]);

  writeFile(root, 'artifacts/teams/alpha/model.bin', 'alpha-model');
  writeFile(root, 'artifacts/teams/beta/model.bin', 'beta-model');
  writeFile(root, 'artifacts/Users/alice@example.com/notes/today.txt', 'alice-notes');
  writeFile(root, 'artifacts/Users/carol@example.com/notes.txt', 'carol-notes');

  writeRecords(root, 'instance_pools.log', [{ instance_pool_id: 'pool-1' }]);
  writeRecords(root, 'cluster_policies.log', [{ policy_id: 'policy-1' }]);
  writeFile(root, 'metastore/default/table_one', 'CREATE TABLE one (id INT)');
  writeRecords(root, 'database_details.log', [{ Namespace: 'default' }]);
}
