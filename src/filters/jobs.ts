/**
 * Job filter
 *
 * A job is kept when it runs on a kept cluster, or when its inline
 * `new_cluster` definition carries a requested team tag.
 */

import { EXPORT_FILES } from '../export/layout.js';
import { toJobRecord, type JobRecord } from '../export/records.js';
import { pruneAcls } from './acls.js';
import { runLineFilter, toKeepSet } from './stage.js';
import { matchesExactTag } from './tags.js';
import type { StageContext, StageOutcome } from './types.js';

export function selectJob(
  job: JobRecord,
  clustersKept: ReadonlySet<string>,
  tags: readonly string[]
): boolean {
  const onKeptCluster = job.existingClusterId !== undefined && clustersKept.has(job.existingClusterId);
  return onKeptCluster || matchesExactTag(job.newClusterTeamTag, tags);
}

export function pruneJobs(
  ctx: StageContext,
  clustersKept: ReadonlySet<string>
): StageOutcome<ReadonlySet<string>> {
  const { report, result } = runLineFilter(ctx, {
    stage: 'jobs',
    file: EXPORT_FILES.jobs,
    toRecord: toJobRecord,
    select: (job) => selectJob(job, clustersKept, ctx.tags),
  });

  return { report, result: toKeepSet(result, (job) => job.jobId) };
}

export function pruneJobAcls(ctx: StageContext, jobsKept: ReadonlySet<string>): StageOutcome<number> {
  const { report, result } = pruneAcls(ctx, {
    stage: 'acl_jobs',
    file: EXPORT_FILES.jobAcls,
    kind: 'jobs',
    parents: jobsKept,
  });
  return { report, result: result.length };
}
