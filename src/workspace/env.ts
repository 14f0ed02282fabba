import { existsSync, readFileSync, writeFileSync, chmodSync } from 'node:fs';
import { z } from 'zod';
import { getStudioPaths } from './paths.js';
import type { ProviderCredentials } from './types.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

const ENV_KEYS = [
  'COHERE_API_KEY',
  'PEXELS_API_KEY',
  'ELEVENLABS_API_KEY',
  'YOUTUBE_ACCESS_TOKEN',
] as const;

type EnvKey = (typeof ENV_KEYS)[number];

const EnvFileSchema = z.record(z.string(), z.string());

/**
 * Load provider keys saved in .shortsmith/env.json into the process
 * environment. Variables already set in the environment win.
 */
export function loadWorkspaceEnv(cwd: string = process.cwd()): void {
  const { envFile } = getStudioPaths(cwd);
  if (!existsSync(envFile)) return;
  let parsed: Record<string, string>;
  try {
    parsed = EnvFileSchema.parse(JSON.parse(readFileSync(envFile, 'utf8')));
  } catch (err) {
    logger.warn('Failed to load workspace env file', { path: envFile, error: errorMessage(err) });
    return;
  }
  for (const key of ENV_KEYS) {
    const value = parsed[key];
    if (value && !process.env[key]) {
      process.env[key] = value;
    }
  }
}

/**
 * Persist provider keys to .shortsmith/env.json (chmod 600), merging with
 * whatever is already stored.
 */
export function persistWorkspaceEnv(
  cwd: string,
  values: Partial<Record<EnvKey, string>>,
): string {
  const { envFile } = getStudioPaths(cwd);
  let current: Record<string, string> = {};
  if (existsSync(envFile)) {
    const result = EnvFileSchema.safeParse(JSON.parse(readFileSync(envFile, 'utf8')));
    if (result.success) current = result.data;
  }
  for (const key of ENV_KEYS) {
    const value = values[key];
    if (value) current[key] = value;
  }
  writeFileSync(envFile, JSON.stringify(current, null, 2), { mode: 0o600 });
  chmodSync(envFile, 0o600);
  return envFile;
}

export function loadProviderCredentials(env: NodeJS.ProcessEnv = process.env): ProviderCredentials {
  const pick = (key: EnvKey) => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };
  return {
    cohereApiKey: pick('COHERE_API_KEY'),
    pexelsApiKey: pick('PEXELS_API_KEY'),
    elevenLabsApiKey: pick('ELEVENLABS_API_KEY'),
    youtubeAccessToken: pick('YOUTUBE_ACCESS_TOKEN'),
  };
}
