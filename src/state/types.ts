import type { z } from 'zod';
import type { Stage } from '../pipeline/stages.js';
import type { Asset, Branding, Capability, Script, Trend } from '../providers/types.js';
import type { ErrorKind } from '../shared/errors.js';
import type { JobPrioritySchema, QualityTierSchema, WeekdaySchema } from '../shared/schemas.js';
import type { QualityReport } from '../quality/gate.js';

export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';
export type JobPriority = z.infer<typeof JobPrioritySchema>;
export type QualityTier = z.infer<typeof QualityTierSchema>;
export type Weekday = z.infer<typeof WeekdaySchema>;

export type StageEvent =
  | 'entered'
  | 'succeeded'
  | 'retried'
  | 'rerouted'
  | 'failed'
  | 'suspended'
  | 'deferred'
  | 'resumed'
  | 'cancelled';

export interface StageHistoryEntry {
  stage: Stage;
  event: StageEvent;
  at: string;
  detail?: string;
}

export interface ErrorHistoryEntry {
  stage: Stage;
  kind: ErrorKind;
  reason: string;
  attempt: number;
  at: string;
}

export interface ProviderCallRecord {
  stage: Stage;
  capability: Capability;
  providerId: string;
  outcome: 'success' | 'retryable' | 'fatal' | 'skipped';
  reason?: string;
  at: string;
}

export interface JobArtifacts {
  trend?: Trend;
  script?: Script;
  assets?: Asset[];
  voiceoverPath?: string;
  videoPath?: string;
  thumbnailPath?: string;
  externalVideoId?: string;
}

export interface Job {
  id: string;
  topic: string | null;
  channel: string;
  stage: Stage;
  status: JobStatus;
  priority: JobPriority;
  retryCount: number;
  improvementCycles: number;
  qualityScore: number | null;
  quality: QualityReport | null;
  approvalId: string | null;
  deferredUntil: string | null;
  activeMs: number;
  createdAt: string;
  updatedAt: string;
  stageEnteredAt: string;
  artifacts: JobArtifacts;
  errorHistory: ErrorHistoryEntry[];
  stageHistory: StageHistoryEntry[];
  providerCalls: ProviderCallRecord[];
}

export interface Channel {
  name: string;
  niche: string;
  qualityTier: QualityTier;
  uploadSchedule: Partial<Record<Weekday, string[]>>;
  branding: Branding;
  dailyUploads: number;
  dailyResetAt: string | null;
  lastUploadAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface JobFilter {
  status?: JobStatus | JobStatus[];
  channel?: string;
  stage?: Stage;
  limit?: number;
}

export interface UploadLimits {
  maxDailyUploads: number;
  minIntervalSeconds: number;
}

export type UploadSlotDecision =
  | { granted: true; reservation: UploadReservation }
  | { granted: false; reason: 'daily_cap' | 'interval'; retryAt: string };

export interface UploadReservation {
  channel: string;
  reservedAt: string;
  previousLastUploadAt: string | null;
}

export type JobStats = Record<JobStatus, number>;

export function lastError(job: Job): ErrorHistoryEntry | null {
  return job.errorHistory[job.errorHistory.length - 1] ?? null;
}

export function isTerminalStatus(status: JobStatus): boolean {
  return status === 'succeeded' || status === 'failed' || status === 'cancelled';
}
