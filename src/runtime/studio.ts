import type Database from 'better-sqlite3';
import { SqliteApprovalGateway } from '../governance/approvals.js';
import type { ApprovalGateway } from '../governance/approvals.js';
import { PipelineEngine } from '../pipeline/engine.js';
import type { CreateJobInput, ExecutionStatus, JobStatusView } from '../pipeline/engine.js';
import { ProviderFactory } from '../providers/factory.js';
import type { FetchFn } from '../providers/types.js';
import { QualityGate } from '../quality/gate.js';
import type { ScriptScorer } from '../quality/gate.js';
import { JobQueue, QueueClosedError } from '../queue/job-queue.js';
import type { Lease, QueueStats } from '../queue/job-queue.js';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';
import type { CircuitState } from '../resilience/circuit-breaker.js';
import { CapacityExceededError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { SqliteStateStore } from '../state/store.js';
import type { StateStore } from '../state/store.js';
import type { Job, JobStats } from '../state/types.js';
import { readStudioConfig } from '../workspace/config.js';
import { openDb } from '../workspace/db.js';
import { loadProviderCredentials, loadWorkspaceEnv } from '../workspace/env.js';
import { getStudioPaths } from '../workspace/paths.js';
import type { ProviderCredentials, StudioConfig, StudioPaths } from '../workspace/types.js';

export interface StudioOptions {
  config: StudioConfig;
  paths: StudioPaths;
  db: Database.Database;
  credentials?: ProviderCredentials;
  fetch?: FetchFn;
  /** Pre-built factory; by default one is built from config and credentials. */
  factory?: ProviderFactory;
  breaker?: CircuitBreaker;
  scorer?: ScriptScorer;
  now?: () => Date;
}

export interface StudioStats {
  queue: QueueStats;
  jobs: JobStats;
  /** Percentage of finished jobs that succeeded; null before any job finished. */
  successRate: number | null;
  circuits: Record<string, CircuitState>;
}

export type CancelResult = { status: 'signalled' } | { status: 'cancelled'; job: Job };

const log = logger.child({ component: 'studio' });

/**
 * One configured instance of the production pipeline: storage, providers,
 * quality gate, approvals, engine and queue, plus the dispatch loop that
 * feeds leased jobs to the engine.
 */
export class Studio {
  readonly store: StateStore;
  readonly approvals: ApprovalGateway;
  readonly breaker: CircuitBreaker;
  readonly factory: ProviderFactory;
  readonly gate: QualityGate;
  readonly engine: PipelineEngine;
  readonly queue: JobQueue;

  private loop: Promise<void> | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly settleWaiters = new Map<string, Array<(status: ExecutionStatus) => void>>();

  constructor(readonly options: StudioOptions) {
    const { config, paths, db } = options;
    this.store = new SqliteStateStore(db);
    this.approvals = new SqliteApprovalGateway(db);
    this.breaker = options.breaker ?? CircuitBreaker.fromConfig(config.circuit_breaker);
    this.factory =
      options.factory ??
      ProviderFactory.build(
        {
          config,
          credentials: options.credentials ?? {},
          paths,
          fetch: options.fetch ?? fetch,
        },
        this.breaker,
      );
    this.gate = new QualityGate(config.quality, options.scorer);
    this.engine = new PipelineEngine({
      store: this.store,
      factory: this.factory,
      gate: this.gate,
      approvals: this.approvals,
      config,
      paths,
      now: options.now,
    });
    this.queue = JobQueue.fromConfig(config.pipeline);
  }

  /** Open the studio for the workspace under `cwd`, with secrets from env.json and the environment. */
  static open(cwd: string = process.cwd()): Studio {
    loadWorkspaceEnv(cwd);
    const paths = getStudioPaths(cwd);
    const config = readStudioConfig(paths.config);
    const db = openDb(paths.stateDb);
    return new Studio({ config, paths, db, credentials: loadProviderCredentials(process.env) });
  }

  /** Create a job and queue it. Refuses before creating anything when the queue is full. */
  submit(input: CreateJobInput): Job {
    if (!this.queue.hasCapacity()) {
      throw new CapacityExceededError(
        `Queue is full (${this.options.config.pipeline.max_queue_size} jobs waiting)`,
      );
    }
    const job = this.engine.createJob(input);
    this.queue.enqueue(job.id, { priority: job.priority });
    return job;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /** Start dispatching queued jobs to the engine. Idempotent. */
  start(): void {
    if (this.loop) return;
    this.loop = this.dispatch().catch((err: unknown) => {
      log.error('Dispatch loop stopped', { error: errorMessage(err) });
    });
    log.info('Studio started', { maxConcurrent: this.options.config.pipeline.max_concurrent_jobs });
  }

  /** Stop taking new leases and wait for running jobs to reach their next resting point. */
  async stop(): Promise<void> {
    this.queue.close();
    await this.loop;
    await Promise.all([...this.inFlight]);
    this.loop = null;
    log.info('Studio stopped');
  }

  async cancel(jobId: string, reason?: string): Promise<CancelResult> {
    if (this.queue.cancel(jobId) === 'signalled') {
      return { status: 'signalled' };
    }
    const job = await this.engine.cancel(jobId, reason);
    this.settle(jobId, 'cancelled');
    return { status: 'cancelled', job };
  }

  async resolveApproval(
    jobId: string,
    decision: 'approve' | 'reject',
    reason?: string,
    actor?: string,
  ): Promise<Job> {
    const job = await this.engine.resolveApproval(jobId, decision, reason, actor);
    if (job.status === 'pending' && !this.queue.isClosed) {
      this.queue.requeue(job.id, { priority: job.priority, activeMs: job.activeMs });
    }
    return job;
  }

  /**
   * Queue persisted jobs this process is not already handling: waiting jobs
   * from a previous run, jobs interrupted mid-stage, deferred uploads and
   * jobs approved from another process. Returns the number queued.
   */
  recover(): number {
    let queued = 0;
    for (const job of this.engine.recoverable()) {
      if (this.queue.has(job.id)) continue;
      if (job.status === 'running') {
        this.store.saveJob({ ...job, status: 'pending', updatedAt: new Date().toISOString() });
      }
      this.queue.requeue(job.id, {
        priority: job.priority,
        activeMs: job.activeMs,
        notBefore: job.deferredUntil ? Date.parse(job.deferredUntil) : undefined,
      });
      queued += 1;
    }
    if (queued > 0) log.info('Recovered jobs', { count: queued });
    return queued;
  }

  status(jobId: string): JobStatusView {
    return this.engine.status(jobId);
  }

  /** Resolves with the outcome of the job's next run (suspended, deferred or terminal). */
  waitForJob(jobId: string): Promise<ExecutionStatus> {
    return new Promise((resolve) => {
      const waiters = this.settleWaiters.get(jobId) ?? [];
      waiters.push(resolve);
      this.settleWaiters.set(jobId, waiters);
    });
  }

  waitForIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  stats(): StudioStats {
    const jobs = this.store.jobStats();
    const finished = jobs.succeeded + jobs.failed + jobs.cancelled;
    return {
      queue: this.queue.stats(),
      jobs,
      successRate: finished === 0 ? null : Math.round((jobs.succeeded / finished) * 1000) / 10,
      circuits: this.breaker.snapshot(),
    };
  }

  private async dispatch(): Promise<void> {
    for (;;) {
      let lease: Lease;
      try {
        lease = await this.queue.dequeue();
      } catch (err) {
        if (err instanceof QueueClosedError) return;
        throw err;
      }
      const task: Promise<void> = this.runLease(lease).finally(() => {
        this.inFlight.delete(task);
      });
      this.inFlight.add(task);
    }
  }

  private async runLease(lease: Lease): Promise<void> {
    let status: ExecutionStatus = 'failed';
    let requeue: { notBefore: number; activeMs: number; job: Job } | null = null;
    try {
      const outcome = await this.engine.execute(lease.jobId, lease.signal);
      status = outcome.status;
      if (outcome.status === 'deferred' && outcome.job.deferredUntil) {
        requeue = {
          notBefore: Date.parse(outcome.job.deferredUntil),
          activeMs: outcome.job.activeMs,
          job: outcome.job,
        };
      }
    } catch (err) {
      log.error('Job execution crashed', { job: lease.jobId, error: errorMessage(err) });
    } finally {
      this.queue.complete(lease.jobId, status);
    }

    if (requeue && !this.queue.isClosed) {
      this.queue.requeue(lease.jobId, {
        priority: requeue.job.priority,
        notBefore: requeue.notBefore,
        activeMs: requeue.activeMs,
      });
    }
    this.settle(lease.jobId, status);
  }

  private settle(jobId: string, status: ExecutionStatus): void {
    const waiters = this.settleWaiters.get(jobId);
    if (!waiters) return;
    this.settleWaiters.delete(jobId);
    for (const resolve of waiters) resolve(status);
  }
}
