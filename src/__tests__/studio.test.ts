import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import { ProviderFactory } from '../providers/factory.js';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { Studio } from '../runtime/studio.js';
import { CapacityExceededError } from '../shared/errors.js';
import { StubScorer, createTempStudio, createTestDb, makeChannel, simpleCandidates } from './test-helpers.js';
import type { TempStudio } from './test-helpers.js';

describe('Studio', () => {
  let temp: TempStudio;
  let db: Database.Database;
  let studio: Studio;

  function open(raw: Record<string, unknown> = {}): Studio {
    temp = createTempStudio(raw);
    db = createTestDb();
    const breaker = CircuitBreaker.fromConfig(temp.config.circuit_breaker);
    const instance = new Studio({
      config: temp.config,
      paths: temp.paths,
      db,
      breaker,
      factory: new ProviderFactory(simpleCandidates(temp), breaker, 5_000),
      scorer: new StubScorer([90]),
    });
    instance.store.saveChannel(makeChannel('tech', { niche: 'technology' }));
    return instance;
  }

  beforeEach(() => {
    studio = open();
  });

  afterEach(async () => {
    await studio.stop();
    db.close();
    temp.cleanup();
  });

  it('runs a submitted job to approval, then to publication once approved', async () => {
    const job = studio.submit({ channel: 'tech', topic: 'AI' });
    const firstRun = studio.waitForJob(job.id);
    studio.start();

    expect(await firstRun).toBe('suspended');
    expect(studio.queue.running()).toBe(0);

    const secondRun = studio.waitForJob(job.id);
    await studio.resolveApproval(job.id, 'approve', 'ship it', 'reviewer');

    expect(await secondRun).toBe('completed');
    expect(studio.status(job.id).job.status).toBe('succeeded');

    const stats = studio.stats();
    expect(stats.jobs.succeeded).toBe(1);
    expect(stats.successRate).toBe(100);
    expect(stats.queue.suspended).toBe(1);
    expect(stats.queue.completed).toBe(1);
    expect(Object.keys(stats.circuits)).toContain('script.simple');
  });

  it('refuses new jobs when the queue is full without creating them', async () => {
    await studio.stop();
    db.close();
    temp.cleanup();
    studio = open({ pipeline: { max_queue_size: 1 } });

    studio.submit({ channel: 'tech', topic: 'first' });

    expect(() => studio.submit({ channel: 'tech', topic: 'second' })).toThrow(CapacityExceededError);
    expect(studio.store.listJobs()).toHaveLength(1);
  });

  it('cancels a job that is still waiting in the queue', async () => {
    const job = studio.submit({ channel: 'tech', topic: 'AI' });

    const result = await studio.cancel(job.id, 'changed my mind');

    expect(result.status).toBe('cancelled');
    expect(studio.queue.size()).toBe(0);
    expect(studio.status(job.id).job.status).toBe('cancelled');
    expect(studio.status(job.id).lastError?.reason).toBe('changed my mind');
  });

  it('requeues persisted unfinished jobs once', () => {
    const waiting = studio.engine.createJob({ channel: 'tech', topic: 'first' });
    const crashed = studio.engine.createJob({ channel: 'tech', topic: 'second' });
    studio.store.saveJob({ ...crashed, status: 'running' });
    studio.engine.createJob({ channel: 'tech', topic: 'third' });
    const failed = studio.engine.createJob({ channel: 'tech', topic: 'fourth' });
    studio.store.saveJob({ ...failed, status: 'failed', stage: 'FAILED' });

    expect(studio.recover()).toBe(3);
    expect(studio.queue.has(waiting.id)).toBe(true);
    expect(studio.store.loadJob(crashed.id)?.status).toBe('pending');
    expect(studio.recover()).toBe(0);
  });

  it('puts a deferred upload back in the queue for when its slot opens', async () => {
    const resetAt = new Date(Date.now() + 60 * 60 * 1000).toISOString();
    studio.store.saveChannel(makeChannel('capped', { dailyUploads: 3, dailyResetAt: resetAt }));
    const job = studio.submit({ channel: 'capped', topic: 'AI' });
    const firstRun = studio.waitForJob(job.id);
    studio.start();
    await firstRun;

    const secondRun = studio.waitForJob(job.id);
    await studio.resolveApproval(job.id, 'approve');

    expect(await secondRun).toBe('deferred');
    expect(studio.queue.has(job.id)).toBe(true);
    expect(studio.queue.stats()).toMatchObject({ waiting: 1, running: 0, deferred: 1 });
    expect(studio.status(job.id).job.deferredUntil).toBe(resetAt);
  });
});
