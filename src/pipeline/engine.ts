import { rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { ApprovalGateway, ApprovalSummary } from '../governance/approvals.js';
import type { ProviderFactory } from '../providers/factory.js';
import type { CallContext, Capability, CapabilityMap, ProviderResult } from '../providers/types.js';
import { feedbackFrom } from '../quality/gate.js';
import type { QualityGate } from '../quality/gate.js';
import { sleep, throwIfAborted } from '../shared/async.js';
import {
  ApprovalRejectedError,
  InvalidStateError,
  NotFoundError,
  PipelineError,
  ProviderFatalError,
  ProviderUnavailableError,
  QualityRejectedError,
  TimeoutError,
  errorMessage,
  toPipelineError,
} from '../shared/errors.js';
import { generateId } from '../shared/ids.js';
import { logger } from '../shared/logger.js';
import type { StateStore } from '../state/store.js';
import { isTerminalStatus, lastError } from '../state/types.js';
import type {
  Channel,
  ErrorHistoryEntry,
  Job,
  JobPriority,
  StageEvent,
  UploadReservation,
} from '../state/types.js';
import type { StudioConfig, StudioPaths } from '../workspace/types.js';
import { isActiveStage, nextStage } from './stages.js';
import type { ActiveStage, Stage } from './stages.js';

export type ExecutionStatus = 'completed' | 'suspended' | 'deferred' | 'failed' | 'cancelled';

export interface ExecutionOutcome {
  status: ExecutionStatus;
  job: Job;
}

export interface CreateJobInput {
  channel: string;
  topic?: string;
  priority?: JobPriority;
}

export interface JobStatusView {
  job: Job;
  lastError: ErrorHistoryEntry | null;
}

export interface PipelineEngineDeps {
  store: StateStore;
  factory: ProviderFactory;
  gate: QualityGate;
  approvals: ApprovalGateway;
  config: StudioConfig;
  paths: StudioPaths;
  now?: () => Date;
}

/** How many times QUALITY_CHECK may send a script back for improvement. */
export const MAX_IMPROVEMENT_CYCLES = 1;

type StepOutcome =
  | { kind: 'advance' }
  | { kind: 'reroute'; to: ActiveStage; detail: string }
  | { kind: 'error'; error: PipelineError }
  | { kind: 'suspend' }
  | { kind: 'defer'; until: string; detail: string };

/** A provider result, or every candidate that ran hit its per-call timeout. */
type CallResult<T> = ProviderResult<T> | { kind: 'timeout'; reason: string };

/** Mutable state of one `execute` call. */
interface Run {
  job: Job;
  channel: Channel;
  ctx: CallContext;
  reservation: UploadReservation | null;
}

const log = logger.child({ component: 'pipeline' });

/**
 * Drives a job through the stage machine. Each call to `execute` runs the
 * job until it finishes, fails, suspends for approval or is deferred; all
 * progress is persisted after every transition so a later `execute` resumes
 * from the stored stage.
 */
export class PipelineEngine {
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineEngineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  createJob(input: CreateJobInput): Job {
    if (!this.deps.store.loadChannel(input.channel)) {
      throw new NotFoundError(`Channel ${input.channel} not found`);
    }
    const at = this.now().toISOString();
    const topic = input.topic?.trim();
    const job: Job = {
      id: generateId('job'),
      topic: topic ? topic : null,
      channel: input.channel,
      stage: 'TREND_CHECK',
      status: 'pending',
      priority: input.priority ?? 'normal',
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
    };
    this.deps.store.saveJob(job);
    log.info('Job created', { job: job.id, channel: job.channel, priority: job.priority });
    return job;
  }

  async execute(jobId: string, signal: AbortSignal): Promise<ExecutionOutcome> {
    const job = this.requireJob(jobId);
    if (isTerminalStatus(job.status)) {
      throw new InvalidStateError(`Job ${jobId} is already ${job.status}`);
    }
    if (this.awaitingApproval(job)) {
      return { status: 'suspended', job };
    }

    const channel = this.deps.store.loadChannel(job.channel);
    if (!channel) {
      this.recordError(job, new ProviderFatalError(`channel ${job.channel} no longer exists`));
      await this.finishFailed(job, null);
      return { status: 'failed', job };
    }

    if (job.deferredUntil) {
      job.deferredUntil = null;
      this.pushHistory(job, 'resumed');
    }
    job.status = 'running';
    this.save(job);

    const run: Run = {
      job,
      channel,
      ctx: { signal, jobId: job.id, workDir: join(this.deps.paths.tmpDir, job.id) },
      reservation: null,
    };
    const startedAt = Date.now();

    try {
      return await this.loop(run);
    } catch (err) {
      if (signal.aborted) {
        const reason = toPipelineError(signal.reason);
        if (reason.kind === 'Cancelled') {
          await this.finishCancelled(job, run.reservation, reason.message);
          return { status: 'cancelled', job };
        }
        this.recordError(job, reason);
        await this.finishFailed(job, run.reservation);
        return { status: 'failed', job };
      }
      log.error('Stage crashed', { job: job.id, stage: job.stage, error: errorMessage(err) });
      this.recordError(job, toPipelineError(err));
      await this.finishFailed(job, run.reservation);
      return { status: 'failed', job };
    } finally {
      job.activeMs += Date.now() - startedAt;
      this.save(job);
    }
  }

  /**
   * Record a human decision for a job suspended at HUMAN_APPROVAL. Approval
   * moves it to UPLOAD (pending, ready to be queued again); rejection fails it.
   */
  async resolveApproval(
    jobId: string,
    decision: 'approve' | 'reject',
    reason?: string,
    actor?: string,
  ): Promise<Job> {
    const job = this.requireJob(jobId);
    if (job.stage !== 'HUMAN_APPROVAL' || !job.approvalId || isTerminalStatus(job.status)) {
      throw new InvalidStateError(`Job ${jobId} is not awaiting approval`);
    }

    this.deps.approvals.decide(
      job.approvalId,
      decision === 'approve' ? 'approved' : 'denied',
      reason,
      actor,
    );

    if (decision === 'approve') {
      this.pushHistory(job, 'resumed', actor ? `approved by ${actor}` : 'approved');
      this.advance(job);
      job.status = 'pending';
      this.save(job);
      log.info('Job approved', { job: job.id, actor });
      return job;
    }

    this.recordError(job, new ApprovalRejectedError(reason ? `rejected: ${reason}` : 'rejected'));
    await this.finishFailed(job, null);
    log.info('Job rejected', { job: job.id, actor, reason });
    return job;
  }

  /**
   * Cancel a job that is not executing in this process (waiting in the queue,
   * deferred or awaiting approval). Running jobs are cancelled through their
   * lease signal instead.
   */
  async cancel(jobId: string, reason = 'cancelled by request'): Promise<Job> {
    const job = this.requireJob(jobId);
    if (isTerminalStatus(job.status)) {
      throw new InvalidStateError(`Job ${jobId} is already ${job.status}`);
    }
    if (job.approvalId && this.awaitingApproval(job)) {
      this.deps.approvals.decide(job.approvalId, 'denied', reason, 'system');
    }
    await this.finishCancelled(job, null, reason);
    return job;
  }

  status(jobId: string): JobStatusView {
    const job = this.requireJob(jobId);
    return { job, lastError: lastError(job) };
  }

  /** Persisted jobs that should be queued again after a restart. */
  recoverable(): Job[] {
    return this.deps.store
      .listJobs({ status: ['pending', 'running'] })
      .filter((job) => !this.awaitingApproval(job))
      .reverse();
  }

  private async loop(run: Run): Promise<ExecutionOutcome> {
    const { job } = run;
    const retryAttempts = this.deps.config.pipeline.retry_attempts;
    const retryDelayMs = this.deps.config.pipeline.retry_delay_seconds * 1000;

    for (let stage = job.stage; isActiveStage(stage); stage = job.stage) {
      throwIfAborted(run.ctx.signal);
      const step = await this.runStage(stage, run);

      switch (step.kind) {
        case 'advance':
          this.advance(job);
          this.save(job);
          break;

        case 'reroute':
          this.pushHistory(job, 'rerouted', step.detail);
          this.enter(job, step.to);
          this.save(job);
          log.info('Job rerouted', { job: job.id, from: stage, to: step.to, detail: step.detail });
          break;

        case 'suspend':
          this.pushHistory(job, 'suspended');
          job.status = 'pending';
          this.save(job);
          log.info('Job awaiting approval', { job: job.id, approval: job.approvalId });
          return { status: 'suspended', job };

        case 'defer':
          job.deferredUntil = step.until;
          job.status = 'pending';
          this.pushHistory(job, 'deferred', step.detail);
          this.save(job);
          log.info('Upload deferred', { job: job.id, channel: job.channel, until: step.until, reason: step.detail });
          return { status: 'deferred', job };

        case 'error': {
          this.recordError(job, step.error);
          if (!step.error.retryable || job.retryCount >= retryAttempts) {
            await this.finishFailed(job, run.reservation);
            return { status: 'failed', job };
          }
          job.retryCount += 1;
          this.pushHistory(job, 'retried', step.error.message);
          this.save(job);
          const delay = retryDelayMs * 2 ** (job.retryCount - 1);
          log.warn('Retrying stage', { job: job.id, stage, attempt: job.retryCount, delayMs: delay, reason: step.error.message });
          await sleep(delay, run.ctx.signal);
          break;
        }
      }
    }

    await this.releaseResources(job, null);
    job.status = 'succeeded';
    this.save(job);
    log.info('Job completed', { job: job.id, video: job.artifacts.externalVideoId });
    return { status: 'completed', job };
  }

  private async runStage(stage: ActiveStage, run: Run): Promise<StepOutcome> {
    const { job, channel } = run;
    const { artifacts } = job;
    const paths = this.deps.paths;

    switch (stage) {
      case 'TREND_CHECK': {
        const result = await this.call(run, 'trend', (p, c) =>
          p.detect({ topic: job.topic ?? undefined, niche: channel.niche }, c),
        );
        if (result.kind !== 'success') return this.failure(result);
        artifacts.trend = result.value;
        job.topic = job.topic ?? result.value.topic;
        return { kind: 'advance' };
      }

      case 'SCRIPT_GEN': {
        const previous = artifacts.script;
        const report = job.quality;
        const result =
          job.improvementCycles > 0 && previous && report
            ? await this.call(run, 'script', (p, c) => p.improve(previous, feedbackFrom(report), c))
            : await this.call(run, 'script', (p, c) =>
                p.generate(this.topicOf(job), this.deps.config.content.default_duration, c),
              );
        if (result.kind !== 'success') return this.failure(result);
        artifacts.script = result.value;
        return { kind: 'advance' };
      }

      case 'QUALITY_CHECK': {
        const script = this.requireArtifact(job, 'script', artifacts.script);
        const report = this.deps.gate.evaluate({ script }, channel.qualityTier);
        job.quality = report;
        job.qualityScore = report.score;
        log.info('Script scored', { job: job.id, score: report.score, decision: report.decision });

        if (report.decision === 'auto-approve') return { kind: 'advance' };
        if (report.decision === 'auto-improve' && job.improvementCycles < MAX_IMPROVEMENT_CYCLES) {
          job.improvementCycles += 1;
          return {
            kind: 'reroute',
            to: 'SCRIPT_GEN',
            detail: `score ${report.score} below ${report.threshold}; improving`,
          };
        }
        const why =
          report.blacklistHits.length > 0
            ? `blacklisted terms: ${report.blacklistHits.join(', ')}`
            : `score ${report.score} below threshold ${report.threshold}`;
        return { kind: 'error', error: new QualityRejectedError(why) };
      }

      case 'ASSET_GATHER': {
        const result = await this.call(run, 'asset', (p, c) =>
          p.gather(
            this.topicOf(job),
            { limit: this.deps.config.content.asset_count, orientation: 'portrait' },
            c,
          ),
        );
        if (result.kind !== 'success') return this.failure(result);
        artifacts.assets = result.value;
        return { kind: 'advance' };
      }

      case 'VOICEOVER': {
        const script = this.requireArtifact(job, 'script', artifacts.script);
        const result = await this.call(run, 'voiceover', (p, c) =>
          p.synthesize(
            script.content,
            { voiceId: channel.branding.voiceId, outputBase: join(paths.audioDir, job.id) },
            c,
          ),
        );
        if (result.kind !== 'success') return this.failure(result);
        artifacts.voiceoverPath = result.value;
        return { kind: 'advance' };
      }

      case 'VIDEO_ASSEMBLY': {
        const script = this.requireArtifact(job, 'script', artifacts.script);
        const voiceoverPath = this.requireArtifact(job, 'voiceover', artifacts.voiceoverPath);
        const result = await this.call(run, 'video', (p, c) =>
          p.assemble(
            {
              script,
              voiceoverPath,
              assets: artifacts.assets ?? [],
              branding: channel.branding,
              outputBase: join(paths.videoDir, job.id),
            },
            c,
          ),
        );
        if (result.kind !== 'success') return this.failure(result);

        const videoPath = result.value;
        const sizeBytes = await stat(videoPath).then(
          (s) => s.size,
          () => null,
        );
        if (sizeBytes === null) {
          return { kind: 'error', error: new ProviderFatalError(`assembled video not found: ${videoPath}`) };
        }
        if (sizeBytes === 0) {
          return { kind: 'error', error: new ProviderFatalError(`assembled video is empty: ${videoPath}`) };
        }
        artifacts.videoPath = videoPath;

        const report = this.deps.gate.evaluate(
          { script, video: { path: videoPath, sizeBytes, durationSeconds: script.durationSeconds } },
          channel.qualityTier,
        );
        job.quality = report;
        job.qualityScore = report.score;
        log.info('Video scored', { job: job.id, score: report.score, production: report.subScores.production });
        if (report.decision === 'reject') {
          return {
            kind: 'error',
            error: new QualityRejectedError(`rendered video scored ${report.score} below ${report.floor}`),
          };
        }
        return { kind: 'advance' };
      }

      case 'THUMBNAIL': {
        const script = this.requireArtifact(job, 'script', artifacts.script);
        const result = await this.call(run, 'thumbnail', (p, c) =>
          p.render(
            {
              title: script.title,
              colorScheme: channel.branding.colorScheme,
              outputBase: join(paths.thumbnailDir, job.id),
            },
            c,
          ),
        );
        if (result.kind !== 'success') return this.failure(result);
        artifacts.thumbnailPath = result.value;
        return { kind: 'advance' };
      }

      case 'HUMAN_APPROVAL': {
        if (job.approvalId) {
          const record = this.deps.approvals.get(job.approvalId);
          if (record?.status === 'approved') return { kind: 'advance' };
          if (record?.status === 'pending') return { kind: 'suspend' };
        }
        const script = this.requireArtifact(job, 'script', artifacts.script);
        const record = this.deps.approvals.requestApproval(this.summaryOf(job, script.title, script.content));
        job.approvalId = record.id;
        return { kind: 'suspend' };
      }

      case 'UPLOAD': {
        const script = this.requireArtifact(job, 'script', artifacts.script);
        const videoPath = this.requireArtifact(job, 'video', artifacts.videoPath);
        const decision = this.deps.store.reserveUploadSlot(
          channel.name,
          {
            maxDailyUploads: this.deps.config.youtube.max_daily_uploads,
            minIntervalSeconds: this.deps.config.youtube.min_upload_interval,
          },
          this.now(),
        );
        if (!decision.granted) {
          return { kind: 'defer', until: decision.retryAt, detail: decision.reason };
        }

        run.reservation = decision.reservation;
        const result = await this.call(run, 'upload', (p, c) =>
          p.upload({ videoPath, thumbnailPath: artifacts.thumbnailPath, script, channel: channel.name }, c),
        );
        if (result.kind !== 'success') {
          this.deps.store.releaseUploadSlot(decision.reservation);
          run.reservation = null;
          return this.failure(result);
        }
        run.reservation = null;
        artifacts.externalVideoId = result.value;
        return { kind: 'advance' };
      }
    }
  }

  /** Invoke a capability through the factory and record every attempt on the job. */
  private async call<C extends Capability, T>(
    run: Run,
    capability: C,
    fn: (provider: CapabilityMap[C], ctx: CallContext) => Promise<ProviderResult<T>>,
  ): Promise<CallResult<T>> {
    const { job } = run;
    const stage = job.stage;
    const invocation = await this.deps.factory.invoke(capability, fn, run.ctx);
    const at = this.now().toISOString();
    for (const attempt of invocation.attempts) {
      job.providerCalls.push({
        stage,
        capability,
        providerId: attempt.providerId,
        outcome: attempt.outcome,
        ...(attempt.reason !== undefined ? { reason: attempt.reason } : {}),
        at,
      });
    }
    if (invocation.timedOut && invocation.result.kind === 'retryable') {
      return { kind: 'timeout', reason: invocation.result.reason };
    }
    return invocation.result;
  }

  private failure(result: { kind: 'retryable' | 'fatal' | 'timeout'; reason: string }): StepOutcome {
    switch (result.kind) {
      case 'fatal':
        return { kind: 'error', error: new ProviderFatalError(result.reason) };
      case 'timeout':
        return { kind: 'error', error: new TimeoutError(result.reason) };
      case 'retryable':
        return { kind: 'error', error: new ProviderUnavailableError(result.reason) };
    }
  }

  private advance(job: Job): void {
    const stage = job.stage;
    if (!isActiveStage(stage)) return;
    this.pushHistory(job, 'succeeded');
    this.enter(job, nextStage(stage));
  }

  private enter(job: Job, stage: Stage): void {
    const at = this.now().toISOString();
    job.stage = stage;
    job.stageEnteredAt = at;
    job.retryCount = 0;
    if (isActiveStage(stage)) {
      job.stageHistory.push({ stage, event: 'entered', at });
    }
    log.debug('Stage entered', { job: job.id, stage });
  }

  private pushHistory(job: Job, event: StageEvent, detail?: string): void {
    job.stageHistory.push({
      stage: job.stage,
      event,
      at: this.now().toISOString(),
      ...(detail !== undefined ? { detail } : {}),
    });
  }

  private recordError(job: Job, error: PipelineError): void {
    job.errorHistory.push({
      stage: job.stage,
      kind: error.kind,
      reason: error.message,
      attempt: job.retryCount + 1,
      at: this.now().toISOString(),
    });
  }

  private async finishFailed(job: Job, reservation: UploadReservation | null): Promise<void> {
    await this.releaseResources(job, reservation);
    const failure = lastError(job);
    this.pushHistory(job, 'failed', failure?.reason);
    job.stage = 'FAILED';
    job.stageEnteredAt = this.now().toISOString();
    job.status = 'failed';
    this.save(job);
    log.warn('Job failed', { job: job.id, kind: failure?.kind, reason: failure?.reason });
  }

  private async finishCancelled(job: Job, reservation: UploadReservation | null, reason: string): Promise<void> {
    await this.releaseResources(job, reservation);
    job.errorHistory.push({
      stage: job.stage,
      kind: 'Cancelled',
      reason,
      attempt: job.retryCount + 1,
      at: this.now().toISOString(),
    });
    this.pushHistory(job, 'cancelled', reason);
    job.stage = 'CANCELLED';
    job.stageEnteredAt = this.now().toISOString();
    job.status = 'cancelled';
    job.deferredUntil = null;
    this.save(job);
    log.info('Job cancelled', { job: job.id, reason });
  }

  private async releaseResources(job: Job, reservation: UploadReservation | null): Promise<void> {
    if (reservation) {
      this.deps.store.releaseUploadSlot(reservation);
    }
    await rm(join(this.deps.paths.tmpDir, job.id), { recursive: true, force: true });
  }

  private awaitingApproval(job: Job): boolean {
    if (job.stage !== 'HUMAN_APPROVAL' || !job.approvalId) return false;
    return this.deps.approvals.get(job.approvalId)?.status === 'pending';
  }

  private summaryOf(job: Job, title: string, content: string): ApprovalSummary {
    return {
      jobId: job.id,
      channel: job.channel,
      topic: job.topic,
      title,
      scriptExcerpt: content.length > 280 ? `${content.slice(0, 277)}...` : content,
      qualityScore: job.qualityScore,
      videoPath: job.artifacts.videoPath ?? null,
      thumbnailPath: job.artifacts.thumbnailPath ?? null,
    };
  }

  private topicOf(job: Job): string {
    return job.topic ?? job.artifacts.trend?.topic ?? job.channel;
  }

  private requireArtifact<T>(job: Job, name: string, value: T | undefined): T {
    if (value === undefined) {
      throw new ProviderFatalError(`job ${job.id} reached ${job.stage} without a ${name} artifact`);
    }
    return value;
  }

  private requireJob(jobId: string): Job {
    const job = this.deps.store.loadJob(jobId);
    if (!job) throw new NotFoundError(`Job ${jobId} not found`);
    return job;
  }

  private save(job: Job): void {
    job.updatedAt = this.now().toISOString();
    this.deps.store.saveJob(job);
  }
}
