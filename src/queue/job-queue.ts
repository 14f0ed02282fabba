import { logger } from '../shared/logger.js';
import { CancelledError, CapacityExceededError, InvalidStateError, TimeoutError } from '../shared/errors.js';
import type { JobPriority } from '../state/types.js';
import type { PipelineConfig } from '../workspace/types.js';

export const PRIORITY_RANK: Record<JobPriority, number> = {
  low: 0,
  normal: 1,
  high: 2,
  critical: 3,
};

export interface JobQueueOptions {
  maxConcurrent: number;
  maxSize: number;
  jobTimeoutMs: number;
  agingIntervalMs: number;
  now?: () => number;
}

export interface EnqueueOptions {
  priority: JobPriority;
  /** Epoch ms before which the job is not handed out. */
  notBefore?: number;
  /** Run time the job has already used; subtracted from its deadline. */
  activeMs?: number;
}

export interface Lease {
  jobId: string;
  priority: JobPriority;
  signal: AbortSignal;
  startedAt: number;
  deadline: number;
}

export type LeaseResult = 'completed' | 'failed' | 'cancelled' | 'suspended' | 'deferred';

export interface QueueStats {
  waiting: number;
  running: number;
  maxConcurrent: number;
  maxSize: number;
  admitted: number;
  completed: number;
  failed: number;
  cancelled: number;
  suspended: number;
  deferred: number;
  timedOut: number;
}

export class QueueClosedError extends Error {
  constructor() {
    super('queue is closed');
    this.name = 'QueueClosedError';
  }
}

interface Waiting {
  jobId: string;
  priority: JobPriority;
  seq: number;
  enqueuedAt: number;
  notBefore: number;
  activeMs: number;
}

interface Running {
  lease: Lease;
  controller: AbortController;
  timer?: NodeJS.Timeout;
}

interface Consumer {
  resolve: (lease: Lease) => void;
  reject: (err: Error) => void;
}

const log = logger.child({ component: 'queue' });

/** Largest delay setTimeout accepts. */
const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Priority job queue with bounded concurrency.
 *
 * A waiting job's effective priority is its tier rank plus one per
 * `agingIntervalMs` it has been ready, so lower tiers are never starved; ties
 * go to the earlier enqueue. `dequeue` resolves only when a ready job and a
 * free slot both exist. Every lease carries an AbortSignal that fires with a
 * TimeoutError at the job's deadline or a CancelledError on `cancel`.
 */
export class JobQueue {
  private readonly waiting: Waiting[] = [];
  private readonly active = new Map<string, Running>();
  private readonly consumers: Consumer[] = [];
  private idleWaiters: Array<() => void> = [];
  private wakeTimer: NodeJS.Timeout | null = null;
  private seq = 0;
  private closed = false;
  private readonly now: () => number;
  private readonly counters = {
    admitted: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
    suspended: 0,
    deferred: 0,
    timedOut: 0,
  };

  constructor(private readonly opts: JobQueueOptions) {
    this.now = opts.now ?? Date.now;
  }

  static fromConfig(config: PipelineConfig, now?: () => number): JobQueue {
    return new JobQueue({
      maxConcurrent: config.max_concurrent_jobs,
      maxSize: config.max_queue_size,
      jobTimeoutMs: config.job_timeout_minutes * 60_000,
      agingIntervalMs: config.aging_interval_seconds * 1000,
      now,
    });
  }

  /** Admit a new job. Throws CapacityExceededError when `maxSize` jobs are already waiting. */
  enqueue(jobId: string, options: EnqueueOptions): string {
    this.assertOpen();
    if (this.has(jobId)) {
      throw new InvalidStateError(`Job ${jobId} is already queued`);
    }
    if (!this.hasCapacity()) {
      throw new CapacityExceededError(`Queue is full (${this.opts.maxSize} jobs waiting)`);
    }
    this.admit(jobId, options);
    return jobId;
  }

  /**
   * Re-admit a job that was already accepted once (deferred, resumed after
   * approval, recovered after restart). Skips the capacity check; a job
   * already waiting or running is left alone.
   */
  requeue(jobId: string, options: EnqueueOptions): void {
    this.assertOpen();
    if (this.has(jobId)) return;
    this.admit(jobId, options);
  }

  hasCapacity(): boolean {
    return this.waiting.length < this.opts.maxSize;
  }

  has(jobId: string): boolean {
    return this.active.has(jobId) || this.waiting.some((w) => w.jobId === jobId);
  }

  dequeue(): Promise<Lease> {
    if (this.closed) return Promise.reject(new QueueClosedError());
    return new Promise<Lease>((resolve, reject) => {
      this.consumers.push({ resolve, reject });
      this.pump();
    });
  }

  /** Release a lease's slot. Returns false for a job that holds no lease. */
  complete(jobId: string, result: LeaseResult): boolean {
    const running = this.active.get(jobId);
    if (!running) return false;
    clearTimeout(running.timer);
    this.active.delete(jobId);
    this.counters[result] += 1;
    log.debug('Lease released', { job: jobId, result, running: this.active.size });
    this.pump();
    return true;
  }

  /**
   * Drop a waiting job, or abort a running job's lease signal. A running job
   * keeps its slot until the holder calls `complete`.
   */
  cancel(jobId: string): 'dequeued' | 'signalled' | 'unknown' {
    const idx = this.waiting.findIndex((w) => w.jobId === jobId);
    if (idx >= 0) {
      this.waiting.splice(idx, 1);
      this.counters.cancelled += 1;
      this.pump();
      return 'dequeued';
    }
    const running = this.active.get(jobId);
    if (running) {
      running.controller.abort(new CancelledError(`Job ${jobId} cancelled`));
      return 'signalled';
    }
    return 'unknown';
  }

  size(): number {
    return this.waiting.length;
  }

  running(): number {
    return this.active.size;
  }

  stats(): QueueStats {
    return {
      waiting: this.waiting.length,
      running: this.active.size,
      maxConcurrent: this.opts.maxConcurrent,
      maxSize: this.opts.maxSize,
      ...this.counters,
    };
  }

  /** Resolves once nothing is running and no waiting job is ready. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Reject pending dequeues and refuse new work. Running leases are left to finish. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.wakeTimer) clearTimeout(this.wakeTimer);
    this.wakeTimer = null;
    for (const consumer of this.consumers.splice(0)) {
      consumer.reject(new QueueClosedError());
    }
    this.notifyIdle();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private assertOpen(): void {
    if (this.closed) throw new QueueClosedError();
  }

  private admit(jobId: string, options: EnqueueOptions): void {
    const now = this.now();
    this.waiting.push({
      jobId,
      priority: options.priority,
      seq: this.seq++,
      enqueuedAt: now,
      notBefore: options.notBefore ?? now,
      activeMs: options.activeMs ?? 0,
    });
    this.counters.admitted += 1;
    log.debug('Job queued', { job: jobId, priority: options.priority, waiting: this.waiting.length });
    this.pump();
  }

  private effectivePriority(entry: Waiting, now: number): number {
    const readySince = Math.max(entry.enqueuedAt, entry.notBefore);
    const aged = Math.floor(Math.max(0, now - readySince) / this.opts.agingIntervalMs);
    return PRIORITY_RANK[entry.priority] + aged;
  }

  private takeNext(): Waiting | undefined {
    const now = this.now();
    let bestIdx = -1;
    let bestScore = -Infinity;
    let bestSeq = Infinity;
    this.waiting.forEach((entry, idx) => {
      if (entry.notBefore > now) return;
      const score = this.effectivePriority(entry, now);
      if (score > bestScore || (score === bestScore && entry.seq < bestSeq)) {
        bestIdx = idx;
        bestScore = score;
        bestSeq = entry.seq;
      }
    });
    if (bestIdx < 0) return undefined;
    return this.waiting.splice(bestIdx, 1)[0];
  }

  private start(entry: Waiting): Lease {
    const controller = new AbortController();
    const startedAt = this.now();
    const budget = Math.max(0, this.opts.jobTimeoutMs - entry.activeMs);
    const lease: Lease = {
      jobId: entry.jobId,
      priority: entry.priority,
      signal: controller.signal,
      startedAt,
      deadline: startedAt + budget,
    };
    const running: Running = { lease, controller };
    this.armDeadline(running, budget);
    this.active.set(entry.jobId, running);
    return lease;
  }

  /** Budgets longer than one timer can hold are covered by re-arming. */
  private armDeadline(running: Running, remainingMs: number): void {
    const { lease, controller } = running;
    const delay = Math.min(remainingMs, MAX_TIMER_MS);
    running.timer = setTimeout(() => {
      if (remainingMs > delay) {
        this.armDeadline(running, remainingMs - delay);
        return;
      }
      this.counters.timedOut += 1;
      log.warn('Job exceeded its deadline', { job: lease.jobId, budgetMs: lease.deadline - lease.startedAt });
      controller.abort(new TimeoutError(`Job ${lease.jobId} exceeded its ${this.opts.jobTimeoutMs}ms time budget`));
    }, delay);
    running.timer.unref();
  }

  private pump(): void {
    while (this.consumers.length > 0 && this.active.size < this.opts.maxConcurrent) {
      const entry = this.takeNext();
      if (!entry) break;
      const consumer = this.consumers.shift();
      if (!consumer) break;
      consumer.resolve(this.start(entry));
    }
    this.scheduleWake();
    this.notifyIdle();
  }

  /** Arrange a pump when the earliest deferred job becomes ready. */
  private scheduleWake(): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    if (this.closed || this.consumers.length === 0 || this.active.size >= this.opts.maxConcurrent) return;
    const now = this.now();
    const future = this.waiting.filter((w) => w.notBefore > now).map((w) => w.notBefore);
    if (future.length === 0) return;
    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = null;
      this.pump();
    }, Math.min(Math.min(...future) - now, MAX_TIMER_MS));
  }

  private isIdle(): boolean {
    if (this.active.size > 0) return false;
    const now = this.now();
    return this.closed || !this.waiting.some((w) => w.notBefore <= now);
  }

  private notifyIdle(): void {
    if (this.idleWaiters.length === 0 || !this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
