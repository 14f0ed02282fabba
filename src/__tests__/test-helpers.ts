import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { applyInlineSchema } from '../workspace/db.js';
import { parseStudioConfig } from '../workspace/config.js';
import { getStudioPaths, outputDirs } from '../workspace/paths.js';
import type { StudioConfig, StudioPaths } from '../workspace/types.js';
import type { Channel } from '../state/types.js';
import type { CandidateMap } from '../providers/factory.js';
import { SimpleTrendProvider } from '../providers/simple/trend.js';
import { SimpleScriptProvider } from '../providers/simple/script.js';
import { SimpleAssetProvider } from '../providers/simple/asset.js';
import { SimpleThumbnailProvider, SimpleVideoProvider, SimpleVoiceoverProvider } from '../providers/simple/media.js';
import { LocalUploader } from '../connector/local/uploader.js';
import type { QualityInput, ScoreBreakdown, ScriptScorer } from '../quality/gate.js';

/**
 * Create a fresh in-memory SQLite database with the full application schema.
 */
export function createTestDb(): Database.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  applyInlineSchema(db);
  return db;
}

export interface TempStudio {
  cwd: string;
  paths: StudioPaths;
  config: StudioConfig;
  cleanup: () => void;
}

/**
 * A temporary working directory with the workspace output tree created and a
 * config parsed from `raw` (defaults everywhere else). Retry backoff defaults
 * to zero so failing stages do not slow tests down.
 */
export function createTempStudio(raw: Record<string, unknown> = {}): TempStudio {
  const cwd = mkdtempSync(join(tmpdir(), 'shortsmith-ws-'));
  const paths = getStudioPaths(cwd);
  for (const dir of outputDirs(paths)) mkdirSync(dir, { recursive: true });

  const pipeline = typeof raw.pipeline === 'object' && raw.pipeline !== null ? raw.pipeline : {};
  const config = parseStudioConfig({
    ...raw,
    pipeline: { retry_delay_seconds: 0, ...pipeline },
  });

  return {
    cwd,
    paths,
    config,
    cleanup: () => rmSync(cwd, { recursive: true, force: true }),
  };
}

export function makeChannel(name: string, overrides: Partial<Channel> = {}): Channel {
  const at = '2026-01-01T00:00:00.000Z';
  return {
    name,
    niche: 'science',
    qualityTier: 'standard',
    uploadSchedule: {},
    branding: { voiceId: 'default', colorScheme: ['#FF0000', '#FFFFFF'] },
    dailyUploads: 0,
    dailyResetAt: null,
    lastUploadAt: null,
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}

/** The built-in offline providers, with the local uploader. */
export function simpleCandidates(studio: TempStudio): CandidateMap {
  return {
    trend: [new SimpleTrendProvider()],
    script: [new SimpleScriptProvider(studio.config)],
    asset: [new SimpleAssetProvider()],
    voiceover: [new SimpleVoiceoverProvider()],
    video: [new SimpleVideoProvider()],
    thumbnail: [new SimpleThumbnailProvider()],
    upload: [new LocalUploader(studio.paths.uploadedDir)],
  };
}

/**
 * Scorer that returns a fixed sequence of scores, one per call, repeating the
 * last. Every report carries one failed check so feedback is never empty; a
 * scored video adds a production sub-score of 100 when it has any bytes.
 */
export class StubScorer implements ScriptScorer {
  readonly inputs: QualityInput[] = [];

  constructor(private readonly scores: number[]) {}

  score(input: QualityInput): ScoreBreakdown {
    const score = this.scores[Math.min(this.inputs.length, this.scores.length - 1)] ?? 0;
    this.inputs.push(input);
    return {
      score,
      subScores: {
        readability: score,
        engagement: score,
        structure: score,
        accuracy: score,
        ...(input.video ? { production: input.video.sizeBytes > 0 ? 100 : 0 } : {}),
      },
      checks: [{ name: 'hook', passed: false, message: 'Open with a question or a surprising claim' }],
      blacklistHits: [],
    };
  }
}
