/**
 * Filter stage exports
 */

export * from './types.js';
export * from './tags.js';
export * from './object-id.js';
export { runLineFilter, toKeepSet, type LineFilterOptions, type Selection } from './stage.js';
export { pruneAcls, type AclFilterOptions } from './acls.js';
export { pruneClusters, pruneClusterAcls } from './clusters.js';
export { pruneJobs, pruneJobAcls, selectJob } from './jobs.js';
export { pruneInstanceProfiles } from './instance-profiles.js';
export { pruneGroups } from './groups.js';
export { pruneUsers } from './users.js';
export {
  classifyDirectory,
  parentPath,
  pathSegments,
  isDirectoryKept,
  pruneDirectories,
  pruneWorkspaceObjects,
  pruneLibraries,
  pruneDirectoryAcls,
  pruneObjectAcls,
  type DirectoryClass,
  type DirectoryKeepSets,
} from './workspace.js';
export { pruneArtifacts, type ArtifactCopy } from './artifacts.js';
export { copyPassThrough, passThroughEntries, type PassThroughOptions } from './passthrough.js';
