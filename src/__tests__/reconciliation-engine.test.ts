import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ReconciliationEngine } from '../core/reconciliation-engine';
import type { DownloadRequest } from '../types/reconcile';
import { makeRecord } from './helpers';

describe('ReconciliationEngine', () => {
  describe('findMissing', () => {
    it('reports only majors without a version directory', () => {
      const r114 = makeRecord('114.0.5735.90', 'linux', 'x64', 'legacy');
      const r115 = makeRecord('115.0.5790.102', 'linux', 'x64');

      const missing = ReconciliationEngine.findMissing([r114, r115], new Set(['114.0']));
      expect(missing).toEqual([{ versionDir: '115.0', record: r115 }]);
    });

    it('keeps every candidate of a missing major in order', () => {
      const older = makeRecord('115.0.5763.0', 'linux', 'x64');
      const newer = makeRecord('115.0.5790.102', 'linux', 'x64');

      const missing = ReconciliationEngine.findMissing([older, newer], new Set());
      expect(missing.map(entry => entry.record.version)).toEqual(['115.0.5763.0', '115.0.5790.102']);
    });

    it('reports nothing when everything is present', () => {
      const missing = ReconciliationEngine.findMissing(
        [makeRecord('114.0.5735.90'), makeRecord('115.0.5790.102')],
        new Set(['114.0', '115.0', '116.0'])
      );
      expect(missing).toEqual([]);
    });
  });

  describe('planDownloads', () => {
    it('downloads only the greatest version of each directory', () => {
      const missing = ReconciliationEngine.findMissing([
        makeRecord('115.0.5790.102', 'linux', 'x64'),
        makeRecord('115.0.5763.0', 'linux', 'x64'),
        makeRecord('116.0.5845.96', 'linux', 'x64')
      ], new Set());

      const planned = ReconciliationEngine.planDownloads(missing);
      expect(planned.map(entry => `${entry.versionDir} ${entry.record.version}`)).toEqual([
        '115.0 115.0.5790.102',
        '116.0 116.0.5845.96'
      ]);
    });
  });

  describe('downloadMissing', () => {
    it('passes each record to the downloader', async () => {
      const legacy = makeRecord('114.0.5735.90', 'windows', 'x86', 'legacy');
      const downloader = vi.fn(async (_request: DownloadRequest) => '/drivers/114.0');

      const summary = await ReconciliationEngine.downloadMissing(
        [{ versionDir: '114.0', record: legacy }],
        '/drivers',
        downloader
      );

      expect(downloader).toHaveBeenCalledWith({
        downloadUrl: legacy.downloadUrl,
        outputDirectory: '/drivers',
        version: '114.0.5735.90',
        platform: 'windows',
        arch: 'x86',
        isLegacy: true
      });
      expect(summary).toEqual({
        succeeded: 1,
        failed: 0,
        outcomes: [{ versionDir: '114.0', record: legacy, success: true }]
      });
    });

    it('keeps going after a failed download', async () => {
      const records = [
        makeRecord('114.0.5735.90'),
        makeRecord('115.0.5790.102'),
        makeRecord('116.0.5845.96')
      ];
      const missing = ReconciliationEngine.findMissing(records, new Set());
      const downloader = vi.fn(async (request: DownloadRequest) => {
        if (request.version === '115.0.5790.102') {
          throw new Error('404 Not Found');
        }
      });

      const summary = await ReconciliationEngine.downloadMissing(missing, '/drivers', downloader);

      expect(downloader).toHaveBeenCalledTimes(3);
      expect(summary.succeeded).toBe(2);
      expect(summary.failed).toBe(1);
      expect(summary.outcomes.map(outcome => [outcome.versionDir, outcome.success, outcome.error])).toEqual([
        ['114.0', true, undefined],
        ['115.0', false, '404 Not Found'],
        ['116.0', true, undefined]
      ]);
    });

    it('counts a downloader that resolves to false as failed', async () => {
      const missing = ReconciliationEngine.findMissing(
        [makeRecord('115.0.5790.102'), makeRecord('116.0.5845.96')],
        new Set()
      );
      const downloader = vi.fn(async (request: DownloadRequest) => request.version !== '115.0.5790.102');

      const summary = await ReconciliationEngine.downloadMissing(missing, '/drivers', downloader);

      expect(summary.succeeded).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.outcomes.map(outcome => [outcome.versionDir, outcome.success, outcome.error])).toEqual([
        ['115.0', false, 'downloader reported failure'],
        ['116.0', true, undefined]
      ]);
    });
  });

  describe('reconcile', () => {
    let root: string;

    beforeEach(async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'driver-reconcile-'));
    });

    afterEach(async () => {
      await fs.remove(root);
    });

    it('reports missing majors without downloading', async () => {
      await fs.ensureDir(path.join(root, '114.0'));
      const r115 = makeRecord('115.0.5790.102', 'linux', 'x64');

      const report = await ReconciliationEngine.reconcile({
        candidates: [makeRecord('114.0.5735.90', 'linux', 'x64', 'legacy'), r115],
        root
      });

      expect(report).toEqual({
        root,
        present: ['114.0'],
        missing: [{ versionDir: '115.0', record: r115 }]
      });
    });

    it('downloads what is missing when given a downloader', async () => {
      const downloader = vi.fn(async (_request: DownloadRequest) => undefined);

      const report = await ReconciliationEngine.reconcile({
        candidates: [makeRecord('115.0.5790.102'), makeRecord('116.0.5845.96')],
        root,
        downloader
      });

      expect(downloader).toHaveBeenCalledTimes(2);
      expect(report.downloads?.succeeded).toBe(2);
      expect(report.downloads?.failed).toBe(0);
    });

    it('skips the downloader when nothing is missing', async () => {
      await fs.ensureDir(path.join(root, '115.0'));
      const downloader = vi.fn(async (_request: DownloadRequest) => undefined);

      const report = await ReconciliationEngine.reconcile({
        candidates: [makeRecord('115.0.5790.102')],
        root,
        downloader
      });

      expect(downloader).not.toHaveBeenCalled();
      expect(report.missing).toEqual([]);
      expect(report.downloads).toBeUndefined();
    });

    it('lists present directories in numeric order', async () => {
      for (const dir of ['114.0', '85.0', '9.0', 'notes']) {
        await fs.ensureDir(path.join(root, dir));
      }

      const report = await ReconciliationEngine.reconcile({ candidates: [], root });

      expect(report.present).toEqual(['9.0', '85.0', '114.0']);
    });

    it('treats a root that does not exist as empty', async () => {
      const report = await ReconciliationEngine.reconcile({
        candidates: [makeRecord('115.0.5790.102')],
        root: path.join(root, 'fresh')
      });

      expect(report.present).toEqual([]);
      expect(report.missing.map(entry => entry.versionDir)).toEqual(['115.0']);
    });
  });
});
