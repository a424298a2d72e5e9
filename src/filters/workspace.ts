/**
 * Workspace tree filters: directories, workspace objects, libraries and their ACLs
 *
 * Directory ownership is encoded in the path:
 *   /Shared               top-level, always kept
 *   /Users/<user>/...     kept when <user> is a kept user
 *   /teams/<team>/...     kept when <team> matches a requested tag
 * Objects and libraries follow their containing directory.
 */

import { EXPORT_FILES } from '../export/layout.js';
import { toPathRecord, type PathRecord } from '../export/records.js';
import { pruneAcls } from './acls.js';
import { runLineFilter, toKeepSet } from './stage.js';
import { matchesTeamName } from './tags.js';
import type { StageContext, StageOutcome } from './types.js';

// =============================================================================
// Path classification
// =============================================================================

/** Optional root some exports prefix onto every workspace path */
export const WORKSPACE_ROOT_SEGMENT = 'Workspace';

export type DirectoryClass =
  | { kind: 'top-level' }
  | { kind: 'user'; userName: string }
  | { kind: 'team'; team: string }
  | { kind: 'other' };

/**
 * Split an absolute workspace path into segments (leading empty segment kept),
 * dropping a leading `/Workspace` root when it has children
 */
export function pathSegments(path: string): string[] {
  const segments = path.split('/');
  if (segments.length > 2 && segments[0] === '' && segments[1] === WORKSPACE_ROOT_SEGMENT) {
    return ['', ...segments.slice(2)];
  }
  return segments;
}

export function classifyDirectory(path: string): DirectoryClass {
  const segments = pathSegments(path);
  if (segments[0] !== '') {
    return { kind: 'other' };
  }
  if (segments.length === 2) {
    return { kind: 'top-level' };
  }

  const [, area, owner] = segments;
  if (owner === undefined || owner === '') {
    return { kind: 'other' };
  }
  if (area === 'Users') {
    return { kind: 'user', userName: owner };
  }
  if (area === 'teams') {
    return { kind: 'team', team: owner };
  }
  return { kind: 'other' };
}

/**
 * Containing directory of a path (`/a/b/c` → `/a/b`)
 */
export function parentPath(path: string): string {
  const index = path.lastIndexOf('/');
  return index <= 0 ? '' : path.slice(0, index);
}

// =============================================================================
// Directories
// =============================================================================

export interface DirectoryKeepSets {
  dirs: ReadonlySet<string>;
  dirIds: ReadonlySet<string>;
}

export function isDirectoryKept(
  directory: DirectoryClass,
  usersKept: ReadonlySet<string>,
  tags: readonly string[]
): boolean {
  switch (directory.kind) {
    case 'top-level':
      return true;
    case 'user':
      return usersKept.has(directory.userName);
    case 'team':
      return matchesTeamName(directory.team, tags);
    case 'other':
      return false;
  }
}

/**
 * Only user and team directories can parent kept objects; top-level
 * directories are written but never referenced
 */
function isOwnedDirectory(record: PathRecord): boolean {
  if (record.path === undefined) return false;
  const { kind } = classifyDirectory(record.path);
  return kind === 'user' || kind === 'team';
}

export function pruneDirectories(
  ctx: StageContext,
  usersKept: ReadonlySet<string>
): StageOutcome<DirectoryKeepSets> {
  const { report, result } = runLineFilter(ctx, {
    stage: 'directories',
    file: EXPORT_FILES.directories,
    toRecord: toPathRecord,
    select: (dir) => {
      if (dir.path === undefined) return false;
      return isDirectoryKept(classifyDirectory(dir.path), usersKept, ctx.tags);
    },
  });

  const owned = result.filter(isOwnedDirectory);
  return {
    report,
    result: {
      dirs: toKeepSet(owned, (dir) => dir.path),
      dirIds: toKeepSet(owned, (dir) => dir.objectId),
    },
  };
}

// =============================================================================
// Objects and libraries
// =============================================================================

function inKeptDirectory(record: PathRecord, dirsKept: ReadonlySet<string>): boolean {
  return record.path !== undefined && dirsKept.has(parentPath(record.path));
}

export function pruneWorkspaceObjects(
  ctx: StageContext,
  dirsKept: ReadonlySet<string>
): StageOutcome<ReadonlySet<string>> {
  const { report, result } = runLineFilter(ctx, {
    stage: 'workspace_objects',
    file: EXPORT_FILES.workspaceObjects,
    toRecord: toPathRecord,
    select: (object) => inKeptDirectory(object, dirsKept),
  });

  return { report, result: toKeepSet(result, (object) => object.objectId) };
}

export function pruneLibraries(ctx: StageContext, dirsKept: ReadonlySet<string>): StageOutcome<number> {
  const { report, result } = runLineFilter(ctx, {
    stage: 'libraries',
    file: EXPORT_FILES.libraries,
    toRecord: toPathRecord,
    select: (library) => inKeptDirectory(library, dirsKept),
  });
  return { report, result: result.length };
}

// =============================================================================
// ACLs
// =============================================================================

export function pruneDirectoryAcls(ctx: StageContext, dirIdsKept: ReadonlySet<string>): StageOutcome<number> {
  const { report, result } = pruneAcls(ctx, {
    stage: 'acl_directories',
    file: EXPORT_FILES.directoryAcls,
    kind: 'directories',
    parents: dirIdsKept,
  });
  return { report, result: result.length };
}

export function pruneObjectAcls(ctx: StageContext, objectIdsKept: ReadonlySet<string>): StageOutcome<number> {
  const { report, result } = pruneAcls(ctx, {
    stage: 'acl_notebooks',
    file: EXPORT_FILES.objectAcls,
    kind: 'notebooks',
    parents: objectIdsKept,
  });
  return { report, result: result.length };
}
