import type { z } from 'zod';
import type { StudioConfigSchema } from '../shared/schemas.js';

export type StudioConfig = z.infer<typeof StudioConfigSchema>;
export type PipelineConfig = StudioConfig['pipeline'];
export type QualityConfig = StudioConfig['quality'];
export type CircuitBreakerConfig = StudioConfig['circuit_breaker'];
export type ProvidersConfig = StudioConfig['providers'];

export interface StudioPaths {
  root: string;          // .shortsmith/
  config: string;        // .shortsmith/config.yaml
  envFile: string;       // .shortsmith/env.json
  stateDb: string;       // .shortsmith/state.db
  outputDir: string;     // .shortsmith/output/
  audioDir: string;      // .shortsmith/output/audio/
  videoDir: string;      // .shortsmith/output/video/
  thumbnailDir: string;  // .shortsmith/output/thumbnails/
  assetDir: string;      // .shortsmith/output/assets/
  uploadedDir: string;   // .shortsmith/output/uploaded/
  tmpDir: string;        // .shortsmith/tmp/
}

/** Provider API keys, read from the environment once at startup. */
export interface ProviderCredentials {
  cohereApiKey?: string;
  pexelsApiKey?: string;
  elevenLabsApiKey?: string;
  youtubeAccessToken?: string;
}
