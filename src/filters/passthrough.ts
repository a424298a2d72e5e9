/**
 * Verbatim pass-through of resources with no tag relationship
 */

import { join } from 'node:path';
import { copyEntry, type CopyOutcome } from '../export/files.js';
import { DEFAULT_PASS_THROUGH, type PassThroughEntry } from '../export/layout.js';
import type { StageContext, StageOutcome } from './types.js';

export interface PassThroughOptions {
  skipMetastore?: boolean;
  /** Additional names (relative to the export root) to copy */
  extra?: readonly string[];
}

/**
 * Resolve the list of entries to copy for a run
 */
export function passThroughEntries(options: PassThroughOptions = {}): PassThroughEntry[] {
  const entries = DEFAULT_PASS_THROUGH.filter((entry) => !(options.skipMetastore && entry.metastore));
  const names = new Set(entries.map((entry) => entry.name));

  for (const name of options.extra ?? []) {
    if (!names.has(name)) {
      names.add(name);
      entries.push({ name });
    }
  }

  return entries;
}

export function copyPassThrough(
  ctx: StageContext,
  options: PassThroughOptions = {}
): StageOutcome<Record<string, CopyOutcome>> {
  const log = ctx.logger.child({ stage: 'pass_through' });
  const warnings: string[] = [];
  const outcomes: Record<string, CopyOutcome> = {};
  const entries = passThroughEntries(options);
  let kept = 0;

  for (const { name } of entries) {
    const outcome = copyEntry(join(ctx.sourceRoot, name), join(ctx.targetRoot, name), ctx.overwrite);
    outcomes[name] = outcome;

    switch (outcome) {
      case 'copied':
        kept++;
        log.debug(`Copied ${name}`);
        break;
      case 'skipped-existing': {
        kept++;
        const message = `File or directory ${name} exists; skipping copy`;
        warnings.push(message);
        log.warn(message);
        break;
      }
      case 'missing-source': {
        const message = `Source ${name} not found; skipping copy`;
        warnings.push(message);
        log.warn(message);
        break;
      }
    }
  }

  return {
    report: { stage: 'pass_through', status: 'filtered', output: '.', read: entries.length, kept, warnings },
    result: outcomes,
  };
}
