/**
 * Cluster filter: the root of the dependency chain
 */

import { EXPORT_FILES } from '../export/layout.js';
import { toClusterRecord } from '../export/records.js';
import { pruneAcls } from './acls.js';
import { runLineFilter, toKeepSet } from './stage.js';
import { matchesExactTag } from './tags.js';
import type { StageContext, StageOutcome } from './types.js';

/**
 * Keep clusters whose `custom_tags.z_team` is one of the requested tags.
 * Returns the ids of the clusters in the destination file.
 */
export function pruneClusters(ctx: StageContext): StageOutcome<ReadonlySet<string>> {
  const { report, result } = runLineFilter(ctx, {
    stage: 'clusters',
    file: EXPORT_FILES.clusters,
    toRecord: toClusterRecord,
    select: (cluster) => matchesExactTag(cluster.teamTag, ctx.tags),
  });

  return { report, result: toKeepSet(result, (cluster) => cluster.clusterId) };
}

export function pruneClusterAcls(
  ctx: StageContext,
  clustersKept: ReadonlySet<string>
): StageOutcome<number> {
  const { report, result } = pruneAcls(ctx, {
    stage: 'acl_clusters',
    file: EXPORT_FILES.clusterAcls,
    kind: 'clusters',
    parents: clustersKept,
  });
  return { report, result: result.length };
}
