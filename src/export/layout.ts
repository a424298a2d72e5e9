/**
 * File and directory names inside a workspace export tree
 *
 * The destination tree mirrors the source naming exactly.
 */

export const EXPORT_FILES = {
  clusters: 'clusters.log',
  clusterAcls: 'acl_clusters.log',
  jobs: 'jobs.log',
  jobAcls: 'acl_jobs.log',
  instanceProfiles: 'instance_profiles.log',
  users: 'users.log',
  directories: 'user_dirs.log',
  workspaceObjects: 'user_workspace.log',
  directoryAcls: 'acl_directories.log',
  objectAcls: 'acl_notebooks.log',
  libraries: 'libraries.log',
} as const;

/** One JSON document per group, named after the group */
export const GROUPS_DIR = 'groups';

/** Whole-subtree artifacts, keyed by team or user name */
export const ARTIFACTS_DIR = 'artifacts';
export const TEAM_ARTIFACTS_DIR = 'teams';
export const USER_ARTIFACTS_DIR = 'Users';

/**
 * An entry copied without filtering
 */
export interface PassThroughEntry {
  /** File or directory name relative to the export root */
  name: string;
  /** Part of the metastore export (omitted under skipMetastore) */
  metastore?: boolean;
}

/**
 * Resources with no tag relationship, copied as-is
 */
export const DEFAULT_PASS_THROUGH: readonly PassThroughEntry[] = [
  { name: 'instance_pools.log' },
  { name: 'cluster_policies.log' },
  { name: 'acl_cluster_policies.log' },
  { name: 'secret_scopes' },
  { name: 'secret_scopes_acls.log' },
  { name: 'table_acls' },
  { name: 'metastore', metastore: true },
  { name: 'metastore_views', metastore: true },
  { name: 'database_details.log', metastore: true },
  { name: 'failed_metastore.log', metastore: true },
];
