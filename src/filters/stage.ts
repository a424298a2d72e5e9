/**
 * Generic line-delimited filter stage
 *
 * Handles the parts every record filter shares: skip-existing, missing input,
 * malformed lines, and writing the kept raw lines.
 */

import { join } from 'node:path';
import { MalformedRecordError } from '../errors.js';
import { isFile, readRecordLines, writeLines } from '../export/files.js';
import type { JsonObject } from '../export/records.js';
import type { StageContext, StageName, StageOutcome, StageStatus } from './types.js';

/**
 * Verdict on a single typed record
 */
export type Selection = boolean | { malformed: string };

export interface LineFilterOptions<T> {
  stage: StageName;
  /** File name, identical in source and destination */
  file: string;
  toRecord: (value: JsonObject) => T;
  select: (record: T) => Selection;
}

/**
 * Run a line filter and return the records present in the destination
 * afterwards. When the destination already exists and overwrite is off, those
 * are the records already there, and nothing is re-filtered.
 */
export function runLineFilter<T>(
  ctx: StageContext,
  options: LineFilterOptions<T>
): StageOutcome<T[]> {
  const { stage, file, toRecord, select } = options;
  const src = join(ctx.sourceRoot, file);
  const dst = join(ctx.targetRoot, file);
  const log = ctx.logger.child({ stage });
  const warnings: string[] = [];

  const finish = (status: StageStatus, read: number, kept: T[]): StageOutcome<T[]> => ({
    report: { stage, status, output: file, read, kept: kept.length, warnings },
    result: kept,
  });

  if (isFile(dst) && !ctx.overwrite) {
    log.warn(`Found existing ${file}; skipping pruning`);
    const existing: T[] = [];
    for (const line of readRecordLines(dst, file)) {
      if (line.ok) {
        existing.push(toRecord(line.value));
      } else {
        warnings.push(line.error.message);
        log.warn(line.error.message);
      }
    }
    return finish('skipped', existing.length, existing);
  }

  if (!isFile(src)) {
    const message = `Source file ${file} not found; nothing to prune`;
    warnings.push(message);
    log.warn(message);
    return finish('missing-source', 0, []);
  }

  const lines = readRecordLines(src, file);
  const keptLines: string[] = [];
  const kept: T[] = [];

  for (const line of lines) {
    if (!line.ok) {
      warnings.push(line.error.message);
      log.warn(line.error.message);
      continue;
    }

    const record = toRecord(line.value);
    const selection = select(record);

    if (typeof selection === 'object') {
      const { message } = new MalformedRecordError(file, line.lineNumber, selection.malformed);
      warnings.push(message);
      log.warn(message);
      continue;
    }

    if (selection) {
      keptLines.push(line.raw);
      kept.push(record);
    }
  }

  writeLines(dst, keptLines);
  log.debug(`Kept ${kept.length} of ${lines.length} records`, { file });

  return finish('filtered', lines.length, kept);
}

/**
 * Collect defined keys into an immutable keep-set
 */
export function toKeepSet<T>(records: readonly T[], key: (record: T) => string | undefined): ReadonlySet<string> {
  const keys = new Set<string>();
  for (const record of records) {
    const value = key(record);
    if (value !== undefined) {
      keys.add(value);
    }
  }
  return keys;
}
