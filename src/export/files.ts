/**
 * Synchronous file access for export trees
 *
 * Every stage loads one file fully, filters it in memory, and writes the
 * kept lines back out unchanged.
 */

import {
  copyFileSync,
  cpSync,
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  rmSync,
  statSync,
  writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { isInteger, isSafeNumber, parse as parseJson } from 'lossless-json';
import { MalformedRecordError } from '../errors.js';
import { isJsonObject, type JsonObject } from './records.js';

// =============================================================================
// Types
// =============================================================================

/**
 * One non-empty line of a line-delimited export file
 */
export type RecordLine =
  | { ok: true; lineNumber: number; raw: string; value: JsonObject }
  | { ok: false; lineNumber: number; raw: string; error: MalformedRecordError };

/**
 * Outcome of copying a file or directory without filtering
 */
export type CopyOutcome = 'copied' | 'skipped-existing' | 'missing-source';

// =============================================================================
// Filesystem checks
// =============================================================================

export function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

export function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * List the names of direct children, sorted so output order is stable
 */
export function listEntries(dir: string, kind: 'file' | 'directory'): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => (kind === 'file' ? entry.isFile() : entry.isDirectory()))
    .map((entry) => entry.name)
    .sort();
}

// =============================================================================
// Line-delimited records
// =============================================================================

/**
 * Workspace, job and directory ids are 64-bit; integers beyond 2^53 stay
 * exact as bigint
 */
function parseNumber(text: string): number | bigint {
  return isInteger(text) && !isSafeNumber(text) ? BigInt(text) : parseFloat(text);
}

/**
 * Split file content into records. Blank lines are ignored; a line that is not
 * a JSON object is returned as a malformed entry rather than thrown.
 */
export function parseRecordLines(content: string, fileLabel: string): RecordLine[] {
  const lines: RecordLine[] = [];
  const rawLines = content.split('\n');

  rawLines.forEach((rawLine, index) => {
    const raw = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (raw.trim() === '') return;
    const lineNumber = index + 1;

    let parsed: unknown;
    try {
      parsed = parseJson(raw, null, parseNumber);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      lines.push({
        ok: false,
        lineNumber,
        raw,
        error: new MalformedRecordError(fileLabel, lineNumber, `invalid JSON (${reason})`),
      });
      return;
    }

    if (!isJsonObject(parsed)) {
      lines.push({
        ok: false,
        lineNumber,
        raw,
        error: new MalformedRecordError(fileLabel, lineNumber, 'record is not a JSON object'),
      });
      return;
    }

    lines.push({ ok: true, lineNumber, raw, value: parsed });
  });

  return lines;
}

export function readRecordLines(path: string, fileLabel: string): RecordLine[] {
  return parseRecordLines(readFileSync(path, 'utf-8'), fileLabel);
}

/**
 * Write raw lines, one per line, creating the parent directory if needed
 */
export function writeLines(path: string, lines: readonly string[]): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, lines.map((line) => `${line}\n`).join(''), 'utf-8');
}

export function readJsonObject(path: string): JsonObject | undefined {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return isJsonObject(parsed) ? parsed : undefined;
}

// =============================================================================
// Verbatim copy
// =============================================================================

/**
 * Copy a file or directory tree.
 *
 * With `overwrite`, the destination is replaced unconditionally (directories
 * are removed first). Without it, an existing destination is left untouched.
 */
export function copyEntry(src: string, dst: string, overwrite: boolean): CopyOutcome {
  const srcIsFile = isFile(src);
  const srcIsDir = !srcIsFile && isDirectory(src);

  if (!srcIsFile && !srcIsDir) {
    return 'missing-source';
  }

  if (!overwrite && existsSync(dst)) {
    return 'skipped-existing';
  }

  mkdirSync(dirname(dst), { recursive: true });

  if (srcIsFile) {
    if (isDirectory(dst)) {
      rmSync(dst, { recursive: true, force: true });
    }
    copyFileSync(src, dst);
  } else {
    rmSync(dst, { recursive: true, force: true });
    cpSync(src, dst, { recursive: true });
  }

  return 'copied';
}
