/**
 * ACL filter shared by clusters, jobs, directories and notebooks
 *
 * An ACL entry survives iff the identifier encoded in its `object_id` is in
 * the parent entity's keep-set.
 */

import { toAclRecord, type AclRecord } from '../export/records.js';
import { parseObjectId, type AclKind } from './object-id.js';
import { runLineFilter } from './stage.js';
import type { StageContext, StageName, StageOutcome } from './types.js';

export interface AclFilterOptions {
  stage: StageName;
  file: string;
  kind: AclKind;
  /** Identifiers of the surviving parent records */
  parents: ReadonlySet<string>;
}

export function pruneAcls(ctx: StageContext, options: AclFilterOptions): StageOutcome<AclRecord[]> {
  const { stage, file, kind, parents } = options;

  return runLineFilter(ctx, {
    stage,
    file,
    toRecord: toAclRecord,
    select: (acl) => {
      const parsed = parseObjectId(acl.objectId, kind);
      if (!parsed.ok) {
        return { malformed: parsed.reason };
      }
      return parents.has(parsed.id);
    },
  });
}
