/**
 * Typed views over export records
 *
 * Export files carry loosely-shaped JSON; every field the pipeline reads is
 * narrowed here into an explicit optional property. A missing or mistyped
 * field becomes `undefined`, which filters treat as "does not match".
 */

// =============================================================================
// JSON narrowing
// =============================================================================

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getObject(obj: JsonObject | undefined, key: string): JsonObject | undefined {
  const value = obj?.[key];
  return isJsonObject(value) ? value : undefined;
}

function getString(obj: JsonObject | undefined, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read an identifier that may be exported as a number or a string.
 * Ids are compared as strings across files (e.g. `job_id: 42` vs `"/jobs/42"`);
 * large ids arrive as bigint.
 */
function getId(obj: JsonObject | undefined, key: string): string | undefined {
  const value = obj?.[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

// =============================================================================
// Record variants
// =============================================================================

export interface ClusterRecord {
  clusterId?: string;
  /** `custom_tags.z_team` */
  teamTag?: string;
}

export interface JobRecord {
  jobId?: string;
  /** `settings.existing_cluster_id` */
  existingClusterId?: string;
  /** `settings.new_cluster.custom_tags.z_team` */
  newClusterTeamTag?: string;
}

export interface AclRecord {
  /** Encoded reference such as `/clusters/0101-abc` */
  objectId?: string;
}

export interface InstanceProfileRecord {
  arn?: string;
}

export interface UserRecord {
  userName?: string;
  id?: string;
}

/** Directories, workspace objects and libraries are all addressed by path */
export interface PathRecord {
  path?: string;
  objectId?: string;
}

export interface GroupRecord {
  /** `members[].userName`, in file order */
  memberUserNames: string[];
}

// =============================================================================
// Parsers
// =============================================================================

export function toClusterRecord(obj: JsonObject): ClusterRecord {
  return {
    clusterId: getId(obj, 'cluster_id'),
    teamTag: getString(getObject(obj, 'custom_tags'), 'z_team'),
  };
}

export function toJobRecord(obj: JsonObject): JobRecord {
  const settings = getObject(obj, 'settings');
  const newCluster = getObject(settings, 'new_cluster');
  return {
    jobId: getId(obj, 'job_id'),
    existingClusterId: getId(settings, 'existing_cluster_id'),
    newClusterTeamTag: getString(getObject(newCluster, 'custom_tags'), 'z_team'),
  };
}

export function toAclRecord(obj: JsonObject): AclRecord {
  return { objectId: getString(obj, 'object_id') };
}

export function toInstanceProfileRecord(obj: JsonObject): InstanceProfileRecord {
  return { arn: getString(obj, 'instance_profile_arn') };
}

export function toUserRecord(obj: JsonObject): UserRecord {
  return {
    userName: getString(obj, 'userName'),
    id: getId(obj, 'id'),
  };
}

export function toPathRecord(obj: JsonObject): PathRecord {
  return {
    path: getString(obj, 'path'),
    objectId: getId(obj, 'object_id'),
  };
}

export function toGroupRecord(obj: JsonObject): GroupRecord {
  const members = obj['members'];
  const memberUserNames: string[] = [];
  if (Array.isArray(members)) {
    for (const member of members) {
      const userName = isJsonObject(member) ? getString(member, 'userName') : undefined;
      if (userName !== undefined) {
        memberUserNames.push(userName);
      }
    }
  }
  return { memberUserNames };
}
