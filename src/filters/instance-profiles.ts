/**
 * Instance-profile filter: independent of every other stage
 */

import { EXPORT_FILES } from '../export/layout.js';
import { toInstanceProfileRecord } from '../export/records.js';
import { runLineFilter } from './stage.js';
import { matchesSubstringTag } from './tags.js';
import type { StageContext, StageOutcome } from './types.js';

/**
 * Keep profiles whose ARN contains a requested tag. ARNs cannot contain `_`,
 * so tags are matched in their hyphenated form.
 */
export function pruneInstanceProfiles(ctx: StageContext): StageOutcome<number> {
  const { report, result } = runLineFilter(ctx, {
    stage: 'instance_profiles',
    file: EXPORT_FILES.instanceProfiles,
    toRecord: toInstanceProfileRecord,
    select: (profile) => matchesSubstringTag(profile.arn, ctx.tags),
  });
  return { report, result: result.length };
}
