import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { SqliteStateStore, nextUtcMidnight } from '../state/store.js';
import type { Job, UploadLimits } from '../state/types.js';
import { InvalidStateError, NotFoundError } from '../shared/errors.js';
import { applyInlineSchema } from '../workspace/db.js';
import { createTestDb, makeChannel } from './test-helpers.js';

const LIMITS: UploadLimits = { maxDailyUploads: 3, minIntervalSeconds: 4 * 60 * 60 };

function makeJob(id: string, overrides: Partial<Job> = {}): Job {
  const at = '2026-03-10T09:00:00.000Z';
  return {
    id,
    topic: 'tardigrades',
    channel: 'nature',
    stage: 'TREND_CHECK',
    status: 'pending',
    priority: 'normal',
    retryCount: 0,
    improvementCycles: 0,
    qualityScore: null,
    quality: null,
    approvalId: null,
    deferredUntil: null,
    activeMs: 0,
    createdAt: at,
    updatedAt: at,
    stageEnteredAt: at,
    artifacts: {},
    errorHistory: [],
    stageHistory: [{ stage: 'TREND_CHECK', event: 'entered', at }],
    providerCalls: [],
    ...overrides,
  };
}

describe('SqliteStateStore', () => {
  let db: Database.Database;
  let store: SqliteStateStore;

  beforeEach(() => {
    db = createTestDb();
    store = new SqliteStateStore(db);
    store.saveChannel(makeChannel('nature', { niche: 'nature' }));
  });

  afterEach(() => {
    db.close();
  });

  describe('jobs', () => {
    it('round-trips a job with its histories and artifacts', () => {
      const job = makeJob('job_a', {
        stage: 'VOICEOVER',
        status: 'running',
        qualityScore: 81.5,
        artifacts: { script: { title: 'T', content: 'C', durationSeconds: 45, hashtags: ['#shorts'], generator: 'simple' } },
        errorHistory: [
          { stage: 'ASSET_GATHER', kind: 'ProviderUnavailable', reason: 'no provider available', attempt: 1, at: '2026-03-10T09:01:00.000Z' },
        ],
        providerCalls: [
          { stage: 'ASSET_GATHER', capability: 'asset', providerId: 'asset.pexels', outcome: 'retryable', reason: 'pexels responded 503', at: '2026-03-10T09:01:00.000Z' },
        ],
      });
      store.saveJob(job);
      expect(store.loadJob('job_a')).toEqual(job);
    });

    it('updates an existing job in place', () => {
      store.saveJob(makeJob('job_a'));
      store.saveJob(makeJob('job_a', { stage: 'SCRIPT_GEN', retryCount: 2, activeMs: 1234.6 }));

      const loaded = store.loadJob('job_a');
      expect(loaded?.stage).toBe('SCRIPT_GEN');
      expect(loaded?.retryCount).toBe(2);
      expect(loaded?.activeMs).toBe(1235);
      expect(store.listJobs()).toHaveLength(1);
    });

    it('returns null for an unknown job', () => {
      expect(store.loadJob('job_missing')).toBeNull();
    });

    it('filters by status, channel and stage, newest first', () => {
      store.saveChannel(makeChannel('space'));
      store.saveJob(makeJob('job_1', { createdAt: '2026-03-10T09:00:00.000Z' }));
      store.saveJob(makeJob('job_2', { createdAt: '2026-03-10T10:00:00.000Z', status: 'failed', stage: 'FAILED' }));
      store.saveJob(makeJob('job_3', { createdAt: '2026-03-10T11:00:00.000Z', channel: 'space' }));

      expect(store.listJobs().map((j) => j.id)).toEqual(['job_3', 'job_2', 'job_1']);
      expect(store.listJobs({ status: 'pending' }).map((j) => j.id)).toEqual(['job_3', 'job_1']);
      expect(store.listJobs({ status: ['failed', 'cancelled'] }).map((j) => j.id)).toEqual(['job_2']);
      expect(store.listJobs({ status: [] })).toEqual([]);
      expect(store.listJobs({ channel: 'space' }).map((j) => j.id)).toEqual(['job_3']);
      expect(store.listJobs({ stage: 'FAILED' }).map((j) => j.id)).toEqual(['job_2']);
      expect(store.listJobs({ limit: 1 }).map((j) => j.id)).toEqual(['job_3']);
    });

    it('counts jobs by status', () => {
      store.saveJob(makeJob('job_1'));
      store.saveJob(makeJob('job_2', { status: 'succeeded', stage: 'DONE' }));
      store.saveJob(makeJob('job_3', { status: 'succeeded', stage: 'DONE' }));

      expect(store.jobStats()).toEqual({ pending: 1, running: 0, succeeded: 2, failed: 0, cancelled: 0 });
    });
  });

  describe('channels', () => {
    it('round-trips a channel', () => {
      const channel = makeChannel('space', {
        qualityTier: 'premium',
        uploadSchedule: { monday: ['09:00', '18:00'] },
        branding: { voiceId: 'narrator', colorScheme: ['#000000'], watermark: 'space.png' },
      });
      store.saveChannel(channel);
      expect(store.loadChannel('space')).toEqual(channel);
      expect(store.listChannels().map((c) => c.name)).toEqual(['nature', 'space']);
    });

    it('keeps upload counters when a channel is saved again', () => {
      store.reserveUploadSlot('nature', LIMITS, new Date('2026-03-10T12:00:00.000Z'));
      store.saveChannel(makeChannel('nature', { niche: 'wildlife' }));

      const loaded = store.loadChannel('nature');
      expect(loaded?.niche).toBe('wildlife');
      expect(loaded?.dailyUploads).toBe(1);
      expect(loaded?.lastUploadAt).toBe('2026-03-10T12:00:00.000Z');
    });

    it('refuses to delete a channel with unfinished jobs', () => {
      store.saveJob(makeJob('job_1', { status: 'running' }));
      expect(() => store.deleteChannel('nature')).toThrow(InvalidStateError);

      store.saveJob(makeJob('job_1', { status: 'succeeded', stage: 'DONE' }));
      store.deleteChannel('nature');
      expect(store.loadChannel('nature')).toBeNull();
    });

    it('reports a missing channel on delete', () => {
      expect(() => store.deleteChannel('ghost')).toThrow(NotFoundError);
    });
  });

  describe('upload slots', () => {
    it('rolls the daily window at the next UTC midnight', () => {
      expect(nextUtcMidnight(new Date('2026-03-10T23:59:59.000Z'))).toBe('2026-03-11T00:00:00.000Z');
    });

    it('grants up to the daily cap, then defers to the next window', () => {
      const limits: UploadLimits = { maxDailyUploads: 2, minIntervalSeconds: 0 };
      const first = store.reserveUploadSlot('nature', limits, new Date('2026-03-10T08:00:00.000Z'));
      const second = store.reserveUploadSlot('nature', limits, new Date('2026-03-10T09:00:00.000Z'));
      const third = store.reserveUploadSlot('nature', limits, new Date('2026-03-10T10:00:00.000Z'));

      expect(first.granted).toBe(true);
      expect(second.granted).toBe(true);
      expect(third).toEqual({ granted: false, reason: 'daily_cap', retryAt: '2026-03-11T00:00:00.000Z' });

      const nextDay = store.reserveUploadSlot('nature', limits, new Date('2026-03-11T00:00:00.000Z'));
      expect(nextDay.granted).toBe(true);
      expect(store.loadChannel('nature')?.dailyUploads).toBe(1);
    });

    it('enforces the minimum interval between uploads', () => {
      store.reserveUploadSlot('nature', LIMITS, new Date('2026-03-10T08:00:00.000Z'));
      const tooSoon = store.reserveUploadSlot('nature', LIMITS, new Date('2026-03-10T09:00:00.000Z'));

      expect(tooSoon).toEqual({ granted: false, reason: 'interval', retryAt: '2026-03-10T12:00:00.000Z' });
      expect(store.reserveUploadSlot('nature', LIMITS, new Date('2026-03-10T12:00:00.000Z')).granted).toBe(true);
    });

    it('reports the later of the cap and interval waits', () => {
      const limits: UploadLimits = { maxDailyUploads: 1, minIntervalSeconds: 20 * 60 * 60 };
      store.reserveUploadSlot('nature', limits, new Date('2026-03-10T20:00:00.000Z'));
      const denied = store.reserveUploadSlot('nature', limits, new Date('2026-03-10T21:00:00.000Z'));

      expect(denied).toEqual({ granted: false, reason: 'interval', retryAt: '2026-03-11T16:00:00.000Z' });
    });

    it('refunds a released slot and restores the previous upload time', () => {
      const limits: UploadLimits = { maxDailyUploads: 3, minIntervalSeconds: 0 };
      store.reserveUploadSlot('nature', limits, new Date('2026-03-10T08:00:00.000Z'));
      const decision = store.reserveUploadSlot('nature', limits, new Date('2026-03-10T09:00:00.000Z'));
      if (!decision.granted) throw new Error('expected a slot');

      store.releaseUploadSlot(decision.reservation);

      const channel = store.loadChannel('nature');
      expect(channel?.dailyUploads).toBe(1);
      expect(channel?.lastUploadAt).toBe('2026-03-10T08:00:00.000Z');
    });

    it('throws for an unknown channel', () => {
      expect(() => store.reserveUploadSlot('ghost', LIMITS, new Date())).toThrow(NotFoundError);
    });
  });
});

describe('upload slots across connections', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'shortsmith-db-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('never grants more than the daily cap to competing writers', async () => {
    const file = join(dir, 'state.db');
    const open = () => {
      const db = new Database(file);
      db.pragma('journal_mode = WAL');
      db.pragma('busy_timeout = 5000');
      applyInlineSchema(db);
      return db;
    };
    const dbA = open();
    const dbB = open();
    const storeA = new SqliteStateStore(dbA);
    const storeB = new SqliteStateStore(dbB);
    storeA.saveChannel(makeChannel('nature', { dailyUploads: 2, dailyResetAt: '2026-03-11T00:00:00.000Z' }));

    const limits: UploadLimits = { maxDailyUploads: 3, minIntervalSeconds: 0 };
    const at = new Date('2026-03-10T12:00:00.000Z');
    const decisions = await Promise.all([
      Promise.resolve().then(() => storeA.reserveUploadSlot('nature', limits, at)),
      Promise.resolve().then(() => storeB.reserveUploadSlot('nature', limits, at)),
    ]);

    expect(decisions.filter((d) => d.granted)).toHaveLength(1);
    expect(decisions.filter((d) => !d.granted)).toEqual([
      { granted: false, reason: 'daily_cap', retryAt: '2026-03-11T00:00:00.000Z' },
    ]);
    expect(storeA.loadChannel('nature')?.dailyUploads).toBe(3);

    dbA.close();
    dbB.close();
  });
});
