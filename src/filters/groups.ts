/**
 * Group filter
 *
 * Groups are whole JSON documents, one per file under `groups/`. A group is
 * kept when its file name contains a requested tag (hyphenated), and its
 * members become the user keep-set.
 */

import { mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { copyEntry, isDirectory, listEntries, readJsonObject } from '../export/files.js';
import { GROUPS_DIR } from '../export/layout.js';
import { toGroupRecord } from '../export/records.js';
import type { Logger } from '../utils/logger.js';
import { matchesSubstringTag } from './tags.js';
import type { StageContext, StageOutcome } from './types.js';

/**
 * Read member user names from a group file. An unreadable file contributes no
 * members and yields a warning instead.
 */
function readMembers(path: string, name: string, warnings: string[], log: Logger): string[] {
  try {
    const group = readJsonObject(path);
    if (!group) {
      throw new Error('group file is not a JSON object');
    }
    return toGroupRecord(group).memberUserNames;
  } catch (err) {
    const message = `${GROUPS_DIR}/${name}: ${err instanceof Error ? err.message : String(err)}`;
    warnings.push(message);
    log.warn(message);
    return [];
  }
}

export function pruneGroups(ctx: StageContext): StageOutcome<ReadonlySet<string>> {
  const srcDir = join(ctx.sourceRoot, GROUPS_DIR);
  const dstDir = join(ctx.targetRoot, GROUPS_DIR);
  const log = ctx.logger.child({ stage: 'groups' });
  const warnings: string[] = [];
  const users = new Set<string>();

  // Existing output is authoritative: every group already copied counts as kept
  if (isDirectory(dstDir) && !ctx.overwrite) {
    log.warn(`Found existing ${GROUPS_DIR}/ directory; skipping pruning`);
    const existing = listEntries(dstDir, 'file');
    for (const name of existing) {
      for (const userName of readMembers(join(dstDir, name), name, warnings, log)) {
        users.add(userName);
      }
    }
    return {
      report: {
        stage: 'groups',
        status: 'skipped',
        output: GROUPS_DIR,
        read: existing.length,
        kept: existing.length,
        warnings,
      },
      result: users,
    };
  }

  if (!isDirectory(srcDir)) {
    const message = `Source directory ${GROUPS_DIR}/ not found; nothing to prune`;
    warnings.push(message);
    log.warn(message);
    return {
      report: { stage: 'groups', status: 'missing-source', output: GROUPS_DIR, read: 0, kept: 0, warnings },
      result: users,
    };
  }

  const groups = listEntries(srcDir, 'file');
  let kept = 0;
  // The directory is the stage's output file: replace it as a whole
  rmSync(dstDir, { recursive: true, force: true });
  mkdirSync(dstDir, { recursive: true });

  for (const name of groups) {
    if (!matchesSubstringTag(name, ctx.tags)) continue;

    const srcFile = join(srcDir, name);
    copyEntry(srcFile, join(dstDir, name), true);
    kept++;

    for (const userName of readMembers(srcFile, name, warnings, log)) {
      users.add(userName);
    }
  }

  log.debug(`Kept ${kept} of ${groups.length} groups with ${users.size} members`);

  return {
    report: { stage: 'groups', status: 'filtered', output: GROUPS_DIR, read: groups.length, kept, warnings },
    result: users,
  };
}
