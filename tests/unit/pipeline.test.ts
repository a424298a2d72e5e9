/**
 * Unit Tests: End-to-end pruning of a sample export
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { pruneExport, type PruneSettings } from '../../src/pipeline.js';
import { SourceNotFoundError } from '../../src/errors.js';
import { STAGE_NAMES } from '../../src/filters/types.js';
import {
  cleanupTempDir,
  createTempDir,
  readFile,
  readRecords,
  silentLogger,
  writeSampleExport,
} from '../helpers/fixtures.js';

/**
 * Relative path → content for every file under a directory
 */
function treeContents(root: string): Record<string, string> {
  const contents: Record<string, string> = {};
  for (const relative of readdirSync(root, { recursive: true, encoding: 'utf-8' }).sort()) {
    const path = join(root, relative);
    if (statSync(path).isFile()) {
      contents[relative] = readFileSync(path, 'utf-8');
    }
  }
  return contents;
}

describe('pruneExport', () => {
  let tempDir: string;
  let src: string;
  let dst: string;

  const settings = (overrides: Partial<PruneSettings> = {}): PruneSettings => ({
    sourcePath: src,
    targetPath: dst,
    tags: ['team_alpha'],
    overwrite: false,
    skipMetastore: false,
    skipArtifacts: false,
    passThrough: [],
    ...overrides,
  });

  beforeEach(() => {
    tempDir = createTempDir();
    src = join(tempDir, 'export');
    dst = join(tempDir, 'pruned');
    writeSampleExport(src);
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  describe('fresh destination', () => {
    it('should run every stage in dependency order', () => {
      const report = pruneExport(settings(), silentLogger());

      expect(report.stages.map((s) => s.stage)).toEqual([...STAGE_NAMES]);
      expect(report.failedStages).toEqual([]);
    });

    it('should report the final keep-set sizes', () => {
      const report = pruneExport(settings(), silentLogger());

      expect(report.keepSets).toEqual({
        clusters: 1,
        jobs: 2,
        users: 2,
        dirs: 3,
        dirIds: 3,
        objectIds: 2,
      });
    });

    it('should keep clusters, jobs and their ACLs for the tag', () => {
      pruneExport(settings(), silentLogger());

      expect(readRecords(dst, 'clusters.log').map((c) => c.cluster_id)).toEqual(['0101-alpha']);
      expect(readRecords(dst, 'acl_clusters.log').map((a) => a.object_id)).toEqual(['/clusters/0101-alpha']);
      expect(readRecords(dst, 'jobs.log').map((j) => j.job_id)).toEqual([11, 13]);
      expect(readRecords(dst, 'acl_jobs.log').map((a) => a.object_id)).toEqual(['/jobs/11', '/jobs/13']);
      expect(readRecords(dst, 'instance_profiles.log')).toEqual([
        { instance_profile_arn: 'arn:aws:iam::123456789012:instance-profile/team-alpha-s3' },
      ]);
    });

    it('should keep groups, their members and their workspace trees', () => {
      pruneExport(settings(), silentLogger());

      expect(readdirSync(join(dst, 'groups'))).toEqual(['team-alpha-admins.json']);
      expect(readRecords(dst, 'users.log').map((u) => u.userName)).toEqual(['alice@example.com', 'bob@example.com']);
      expect(readRecords(dst, 'user_dirs.log').map((d) => d.object_id)).toEqual([100, 101, 102, 104]);
      expect(readRecords(dst, 'user_workspace.log').map((o) => o.object_id)).toEqual([201, 203]);
      expect(readRecords(dst, 'acl_directories.log').map((a) => a.object_id)).toEqual([
        '/directories/101',
        '/directories/104',
      ]);
      expect(readRecords(dst, 'acl_notebooks.log').map((a) => a.object_id)).toEqual([
        '/notebooks/201',
        '/notebooks/203',
      ]);
      expect(readRecords(dst, 'libraries.log')).toEqual([
        { path: '/Users/alice@example.com/etl/utils-lib', object_type: 'LIBRARY' },
      ]);
    });

    it('should copy artifacts and pass-through entries verbatim', () => {
      pruneExport(settings(), silentLogger());

      expect(readFile(dst, 'artifacts/teams/alpha/model.bin')).toBe('alpha-model');
      expect(readFile(dst, 'artifacts/Users/alice@example.com/notes/today.txt')).toBe('alice-notes');
      expect(existsSync(join(dst, 'artifacts/teams/beta'))).toBe(false);
      expect(readFile(dst, 'instance_pools.log')).toBe(readFile(src, 'instance_pools.log'));
      expect(readFile(dst, 'metastore/default/table_one')).toBe('CREATE TABLE one (id INT)');
    });

    it('should only keep ACLs whose parent survived', () => {
      pruneExport(settings(), silentLogger());

      const jobIds = new Set(readRecords(dst, 'jobs.log').map((j) => `/jobs/${String(j.job_id)}`));
      const objectIds = new Set(readRecords(dst, 'user_workspace.log').map((o) => `/notebooks/${String(o.object_id)}`));

      for (const acl of readRecords(dst, 'acl_jobs.log')) {
        expect(jobIds.has(String(acl.object_id))).toBe(true);
      }
      for (const acl of readRecords(dst, 'acl_notebooks.log')) {
        expect(objectIds.has(String(acl.object_id))).toBe(true);
      }
    });

    it('should only keep workspace objects inside kept directories', () => {
      pruneExport(settings(), silentLogger());

      const dirs = new Set(
        readRecords(dst, 'user_dirs.log')
          .map((d) => String(d.path))
          .filter((path) => path !== '/Shared')
      );
      for (const object of readRecords(dst, 'user_workspace.log')) {
        const path = String(object.path);
        expect(dirs.has(path.slice(0, path.lastIndexOf('/')))).toBe(true);
      }
    });

    it('should write empty outputs when no tag matches', () => {
      const report = pruneExport(settings({ tags: ['team_gamma'] }), silentLogger());

      expect(readFile(dst, 'clusters.log')).toBe('');
      expect(readFile(dst, 'jobs.log')).toBe('');
      expect(readdirSync(join(dst, 'groups'))).toEqual([]);
      expect(readRecords(dst, 'user_dirs.log').map((d) => d.path)).toEqual(['/Shared']);
      expect(report.keepSets.users).toBe(0);
    });
  });

  describe('options', () => {
    it('should leave out artifacts with skipArtifacts', () => {
      const report = pruneExport(settings({ skipArtifacts: true }), silentLogger());

      expect(report.stages.map((s) => s.stage)).not.toContain('artifacts');
      expect(existsSync(join(dst, 'artifacts'))).toBe(false);
    });

    it('should leave out metastore exports with skipMetastore', () => {
      pruneExport(settings({ skipMetastore: true }), silentLogger());

      expect(existsSync(join(dst, 'metastore'))).toBe(false);
      expect(existsSync(join(dst, 'database_details.log'))).toBe(false);
      expect(existsSync(join(dst, 'instance_pools.log'))).toBe(true);
    });
  });

  describe('existing destination', () => {
    it('should produce identical output when re-run with overwrite', () => {
      pruneExport(settings({ overwrite: true }), silentLogger());
      const first = treeContents(dst);

      pruneExport(settings({ overwrite: true }), silentLogger());

      expect(treeContents(dst)).toEqual(first);
    });

    it('should keep existing outputs and derive keep-sets from them without overwrite', () => {
      pruneExport(settings(), silentLogger());
      const first = treeContents(dst);

      const report = pruneExport(settings({ tags: ['team_beta'] }), silentLogger());

      expect(report.stages.find((s) => s.stage === 'clusters')?.status).toBe('skipped');
      expect(report.stages.find((s) => s.stage === 'groups')?.status).toBe('skipped');
      expect(report.keepSets.clusters).toBe(1);
      expect(report.keepSets.users).toBe(2);
      expect(readFile(dst, 'clusters.log')).toBe(first['clusters.log']);
      expect(readFile(dst, 'user_workspace.log')).toBe(first['user_workspace.log']);
    });

    it('should replace outputs from a different tag with overwrite', () => {
      pruneExport(settings(), silentLogger());

      pruneExport(settings({ tags: ['team_beta'], overwrite: true }), silentLogger());

      expect(readRecords(dst, 'clusters.log').map((c) => c.cluster_id)).toEqual(['0102-beta']);
      expect(readdirSync(join(dst, 'groups'))).toEqual(['team-beta-users.json']);
      expect(readRecords(dst, 'users.log').map((u) => u.userName)).toEqual(['carol@example.com']);
    });
  });

  describe('failures', () => {
    it('should throw SourceNotFoundError for a missing source root', () => {
      expect(() => pruneExport(settings({ sourcePath: join(tempDir, 'missing') }), silentLogger())).toThrow(
        SourceNotFoundError
      );
      expect(existsSync(dst)).toBe(false);
    });

    it('should record a failing stage and continue with an empty keep-set', () => {
      // A directory where the output file should go makes the write fail
      mkdirSync(join(dst, 'clusters.log'), { recursive: true });

      const report = pruneExport(settings(), silentLogger());

      expect(report.failedStages).toEqual(['clusters']);
      expect(report.keepSets.clusters).toBe(0);
      expect(readRecords(dst, 'jobs.log').map((j) => j.job_id)).toEqual([13]);
      expect(report.stages).toHaveLength(STAGE_NAMES.length);
    });
  });
});
