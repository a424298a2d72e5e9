/**
 * Artifact filter
 *
 * Artifacts are opaque directory subtrees under `artifacts/teams/<team>` and
 * `artifacts/Users/<user>`. Matching subtrees are copied whole; nothing inside
 * them is examined.
 */

import { join } from 'node:path';
import { copyEntry, isDirectory, listEntries } from '../export/files.js';
import { ARTIFACTS_DIR, TEAM_ARTIFACTS_DIR, USER_ARTIFACTS_DIR } from '../export/layout.js';
import { matchesTeamName } from './tags.js';
import type { StageContext, StageOutcome } from './types.js';

export interface ArtifactCopy {
  /** Path relative to the export root, e.g. `artifacts/teams/alpha` */
  path: string;
  outcome: 'copied' | 'skipped-existing';
}

export function pruneArtifacts(
  ctx: StageContext,
  usersKept: ReadonlySet<string>
): StageOutcome<ArtifactCopy[]> {
  const log = ctx.logger.child({ stage: 'artifacts' });
  const warnings: string[] = [];
  const copies: ArtifactCopy[] = [];
  let read = 0;
  let rootsFound = 0;

  const roots: { dir: string; keep: (name: string) => boolean }[] = [
    { dir: TEAM_ARTIFACTS_DIR, keep: (team) => matchesTeamName(team, ctx.tags) },
    { dir: USER_ARTIFACTS_DIR, keep: (user) => usersKept.has(user) },
  ];

  for (const root of roots) {
    const relativeRoot = join(ARTIFACTS_DIR, root.dir);
    const srcRoot = join(ctx.sourceRoot, relativeRoot);

    if (!isDirectory(srcRoot)) {
      const message = `Source directory ${relativeRoot}/ not found; skipping`;
      warnings.push(message);
      log.warn(message);
      continue;
    }
    rootsFound++;

    const names = listEntries(srcRoot, 'directory');
    read += names.length;

    for (const name of names.filter(root.keep)) {
      const relative = join(relativeRoot, name);
      const outcome = copyEntry(join(srcRoot, name), join(ctx.targetRoot, relative), ctx.overwrite);

      if (outcome === 'skipped-existing') {
        const message = `${relative} exists; skipping copy`;
        warnings.push(message);
        log.warn(message);
        copies.push({ path: relative, outcome });
      } else if (outcome === 'copied') {
        log.debug(`Copied ${relative}`);
        copies.push({ path: relative, outcome });
      }
    }
  }

  return {
    report: {
      stage: 'artifacts',
      status: rootsFound === 0 ? 'missing-source' : 'filtered',
      output: ARTIFACTS_DIR,
      read,
      kept: copies.length,
      warnings,
    },
    result: copies,
  };
}
