/**
 * User filter: membership in a kept group is the only way in
 */

import { EXPORT_FILES } from '../export/layout.js';
import { toUserRecord } from '../export/records.js';
import { runLineFilter } from './stage.js';
import type { StageContext, StageOutcome } from './types.js';

export function pruneUsers(ctx: StageContext, usersKept: ReadonlySet<string>): StageOutcome<number> {
  const { report, result } = runLineFilter(ctx, {
    stage: 'users',
    file: EXPORT_FILES.users,
    toRecord: toUserRecord,
    select: (user) => user.userName !== undefined && usersKept.has(user.userName),
  });
  return { report, result: result.length };
}
