import type Database from 'better-sqlite3';
import { InvalidStateError, NotFoundError } from '../shared/errors.js';
import type { QualityReport } from '../quality/gate.js';
import type { Stage } from '../pipeline/stages.js';
import type { Branding } from '../providers/types.js';
import type {
  Channel,
  Job,
  JobArtifacts,
  JobFilter,
  JobPriority,
  JobStats,
  JobStatus,
  QualityTier,
  UploadLimits,
  UploadReservation,
  UploadSlotDecision,
  ErrorHistoryEntry,
  StageHistoryEntry,
  ProviderCallRecord,
  Weekday,
} from './types.js';

/**
 * Persistence boundary for jobs and channels. The pipeline only talks to this
 * interface; SqliteStateStore is the production implementation.
 */
export interface StateStore {
  saveJob(job: Job): void;
  loadJob(id: string): Job | null;
  listJobs(filter?: JobFilter): Job[];
  saveChannel(channel: Channel): void;
  loadChannel(name: string): Channel | null;
  listChannels(): Channel[];
  deleteChannel(name: string): void;
  reserveUploadSlot(channel: string, limits: UploadLimits, now: Date): UploadSlotDecision;
  releaseUploadSlot(reservation: UploadReservation): void;
  jobStats(): JobStats;
}

interface JobRow {
  id: string;
  topic: string | null;
  channel: string;
  stage: Stage;
  status: JobStatus;
  priority: JobPriority;
  retry_count: number;
  improvement_cycles: number;
  quality_score: number | null;
  approval_id: string | null;
  deferred_until: string | null;
  active_ms: number;
  created_at: string;
  updated_at: string;
  stage_entered_at: string;
  data_json: string;
}

interface JobData {
  quality: QualityReport | null;
  artifacts: JobArtifacts;
  errorHistory: ErrorHistoryEntry[];
  stageHistory: StageHistoryEntry[];
  providerCalls: ProviderCallRecord[];
}

interface ChannelRow {
  name: string;
  niche: string;
  quality_tier: QualityTier;
  upload_schedule_json: string;
  branding_json: string;
  daily_uploads: number;
  daily_reset_at: string | null;
  last_upload_at: string | null;
  created_at: string;
  updated_at: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Start of the next UTC day after `now`. */
export function nextUtcMidnight(now: Date): string {
  const next = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1);
  return new Date(next).toISOString();
}

function rowToJob(row: JobRow): Job {
  const data = JSON.parse(row.data_json) as JobData;
  return {
    id: row.id,
    topic: row.topic,
    channel: row.channel,
    stage: row.stage,
    status: row.status,
    priority: row.priority,
    retryCount: row.retry_count,
    improvementCycles: row.improvement_cycles,
    qualityScore: row.quality_score,
    quality: data.quality,
    approvalId: row.approval_id,
    deferredUntil: row.deferred_until,
    activeMs: row.active_ms,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    stageEnteredAt: row.stage_entered_at,
    artifacts: data.artifacts,
    errorHistory: data.errorHistory,
    stageHistory: data.stageHistory,
    providerCalls: data.providerCalls,
  };
}

function rowToChannel(row: ChannelRow): Channel {
  return {
    name: row.name,
    niche: row.niche,
    qualityTier: row.quality_tier,
    uploadSchedule: JSON.parse(row.upload_schedule_json) as Partial<Record<Weekday, string[]>>,
    branding: JSON.parse(row.branding_json) as Branding,
    dailyUploads: row.daily_uploads,
    dailyResetAt: row.daily_reset_at,
    lastUploadAt: row.last_upload_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteStateStore implements StateStore {
  constructor(private readonly db: Database.Database) {}

  saveJob(job: Job): void {
    const data: JobData = {
      quality: job.quality,
      artifacts: job.artifacts,
      errorHistory: job.errorHistory,
      stageHistory: job.stageHistory,
      providerCalls: job.providerCalls,
    };
    this.db
      .prepare(
        `INSERT INTO jobs
           (id, topic, channel, stage, status, priority, retry_count, improvement_cycles,
            quality_score, approval_id, deferred_until, active_ms, created_at, updated_at,
            stage_entered_at, data_json)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           topic = excluded.topic,
           stage = excluded.stage,
           status = excluded.status,
           priority = excluded.priority,
           retry_count = excluded.retry_count,
           improvement_cycles = excluded.improvement_cycles,
           quality_score = excluded.quality_score,
           approval_id = excluded.approval_id,
           deferred_until = excluded.deferred_until,
           active_ms = excluded.active_ms,
           updated_at = excluded.updated_at,
           stage_entered_at = excluded.stage_entered_at,
           data_json = excluded.data_json`,
      )
      .run(
        job.id,
        job.topic,
        job.channel,
        job.stage,
        job.status,
        job.priority,
        job.retryCount,
        job.improvementCycles,
        job.qualityScore,
        job.approvalId,
        job.deferredUntil,
        Math.round(job.activeMs),
        job.createdAt,
        job.updatedAt,
        job.stageEnteredAt,
        JSON.stringify(data),
      );
  }

  loadJob(id: string): Job | null {
    const row = this.db.prepare(`SELECT * FROM jobs WHERE id = ?`).get(id) as JobRow | undefined;
    return row ? rowToJob(row) : null;
  }

  listJobs(filter: JobFilter = {}): Job[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (filter.status !== undefined) {
      const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
      if (statuses.length === 0) return [];
      clauses.push(`status IN (${statuses.map(() => '?').join(', ')})`);
      params.push(...statuses);
    }
    if (filter.channel) {
      clauses.push('channel = ?');
      params.push(filter.channel);
    }
    if (filter.stage) {
      clauses.push('stage = ?');
      params.push(filter.stage);
    }
    const where = clauses.length ? `WHERE ${clauses.join(' AND ')}` : '';
    const limit = filter.limit ? `LIMIT ${Math.max(1, Math.floor(filter.limit))}` : '';
    const rows = this.db
      .prepare(`SELECT * FROM jobs ${where} ORDER BY created_at DESC, rowid DESC ${limit}`)
      .all(...params) as JobRow[];
    return rows.map(rowToJob);
  }

  /**
   * Insert or update a channel's descriptive fields. Upload counters are only
   * ever changed by reserveUploadSlot/releaseUploadSlot.
   */
  saveChannel(channel: Channel): void {
    this.db
      .prepare(
        `INSERT INTO channels
           (name, niche, quality_tier, upload_schedule_json, branding_json,
            daily_uploads, daily_reset_at, last_upload_at, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(name) DO UPDATE SET
           niche = excluded.niche,
           quality_tier = excluded.quality_tier,
           upload_schedule_json = excluded.upload_schedule_json,
           branding_json = excluded.branding_json,
           updated_at = excluded.updated_at`,
      )
      .run(
        channel.name,
        channel.niche,
        channel.qualityTier,
        JSON.stringify(channel.uploadSchedule),
        JSON.stringify(channel.branding),
        channel.dailyUploads,
        channel.dailyResetAt,
        channel.lastUploadAt,
        channel.createdAt,
        channel.updatedAt,
      );
  }

  loadChannel(name: string): Channel | null {
    const row = this.db.prepare(`SELECT * FROM channels WHERE name = ?`).get(name) as
      | ChannelRow
      | undefined;
    return row ? rowToChannel(row) : null;
  }

  listChannels(): Channel[] {
    const rows = this.db.prepare(`SELECT * FROM channels ORDER BY name`).all() as ChannelRow[];
    return rows.map(rowToChannel);
  }

  deleteChannel(name: string): void {
    const remove = this.db.transaction(() => {
      if (!this.loadChannel(name)) {
        throw new NotFoundError(`Channel ${name} not found`);
      }
      const active = this.db
        .prepare(
          `SELECT COUNT(*) AS n FROM jobs
           WHERE channel = ? AND status IN ('pending', 'running')`,
        )
        .get(name) as { n: number };
      if (active.n > 0) {
        throw new InvalidStateError(`Channel ${name} has ${active.n} unfinished job(s)`);
      }
      this.db.prepare(`DELETE FROM channels WHERE name = ?`).run(name);
    });
    remove.immediate();
  }

  /**
   * Atomically claim one upload for `channel`. Rolls the daily window at
   * UTC midnight; denies with the earliest time the claim could succeed when
   * the daily cap is reached or the minimum interval has not elapsed.
   */
  reserveUploadSlot(channel: string, limits: UploadLimits, now: Date): UploadSlotDecision {
    const reserve = this.db.transaction((): UploadSlotDecision => {
      const row = this.db
        .prepare(`SELECT daily_uploads, daily_reset_at, last_upload_at FROM channels WHERE name = ?`)
        .get(channel) as
        | Pick<ChannelRow, 'daily_uploads' | 'daily_reset_at' | 'last_upload_at'>
        | undefined;
      if (!row) throw new NotFoundError(`Channel ${channel} not found`);

      const nowMs = now.getTime();
      let used = row.daily_uploads;
      let resetAt = row.daily_reset_at;
      if (!resetAt || nowMs >= Date.parse(resetAt)) {
        used = 0;
        resetAt = nextUtcMidnight(now);
      }

      const waits: Array<{ reason: 'daily_cap' | 'interval'; at: number }> = [];
      if (used >= limits.maxDailyUploads) {
        waits.push({ reason: 'daily_cap', at: Date.parse(resetAt) });
      }
      if (row.last_upload_at) {
        const earliest = Date.parse(row.last_upload_at) + limits.minIntervalSeconds * 1000;
        if (earliest > nowMs) waits.push({ reason: 'interval', at: earliest });
      }

      if (waits.length > 0) {
        this.db
          .prepare(`UPDATE channels SET daily_uploads = ?, daily_reset_at = ? WHERE name = ?`)
          .run(used, resetAt, channel);
        const latest = waits.reduce((a, b) => (b.at > a.at ? b : a));
        return { granted: false, reason: latest.reason, retryAt: new Date(latest.at).toISOString() };
      }

      const reservedAt = now.toISOString();
      this.db
        .prepare(
          `UPDATE channels SET daily_uploads = ?, daily_reset_at = ?, last_upload_at = ?
           WHERE name = ?`,
        )
        .run(used + 1, resetAt, reservedAt, channel);
      return {
        granted: true,
        reservation: { channel, reservedAt, previousLastUploadAt: row.last_upload_at },
      };
    });
    return reserve.immediate();
  }

  /**
   * Give back a reserved slot after a failed or cancelled upload. A slot from
   * an already rolled-over window is not refunded.
   */
  releaseUploadSlot(reservation: UploadReservation): void {
    const release = this.db.transaction(() => {
      const row = this.db
        .prepare(`SELECT daily_uploads, daily_reset_at, last_upload_at FROM channels WHERE name = ?`)
        .get(reservation.channel) as
        | Pick<ChannelRow, 'daily_uploads' | 'daily_reset_at' | 'last_upload_at'>
        | undefined;
      if (!row) return;

      const windowStart = row.daily_reset_at ? Date.parse(row.daily_reset_at) - DAY_MS : 0;
      const sameWindow = Date.parse(reservation.reservedAt) >= windowStart;
      const used = sameWindow ? Math.max(0, row.daily_uploads - 1) : row.daily_uploads;
      const lastUploadAt =
        row.last_upload_at === reservation.reservedAt
          ? reservation.previousLastUploadAt
          : row.last_upload_at;
      this.db
        .prepare(`UPDATE channels SET daily_uploads = ?, last_upload_at = ? WHERE name = ?`)
        .run(used, lastUploadAt, reservation.channel);
    });
    release.immediate();
  }

  jobStats(): JobStats {
    const stats: JobStats = { pending: 0, running: 0, succeeded: 0, failed: 0, cancelled: 0 };
    const rows = this.db
      .prepare(`SELECT status, COUNT(*) AS n FROM jobs GROUP BY status`)
      .all() as Array<{ status: JobStatus; n: number }>;
    for (const row of rows) stats[row.status] = row.n;
    return stats;
  }
}
