import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, mkdirSync, existsSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadProviderCredentials, loadWorkspaceEnv, persistWorkspaceEnv } from '../workspace/env.js';

const KEYS = ['COHERE_API_KEY', 'PEXELS_API_KEY', 'ELEVENLABS_API_KEY', 'YOUTUBE_ACCESS_TOKEN'] as const;

describe('workspace env helpers', () => {
  let repoRoot: string;
  let previous: Record<string, string | undefined> = {};

  beforeEach(() => {
    repoRoot = mkdtempSync(join(tmpdir(), 'shortsmith-repo-env-'));
    mkdirSync(join(repoRoot, '.shortsmith'));
    previous = {};
    for (const key of KEYS) {
      previous[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = previous[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    rmSync(repoRoot, { recursive: true, force: true });
  });

  it('persists provider keys and reloads them into process.env', () => {
    const envPath = persistWorkspaceEnv(repoRoot, { COHERE_API_KEY: 'test-cohere-key' });
    persistWorkspaceEnv(repoRoot, { PEXELS_API_KEY: 'test-pexels-key' });

    expect(existsSync(envPath)).toBe(true);
    expect(statSync(envPath).mode & 0o777).toBe(0o600);
    expect(JSON.parse(readFileSync(envPath, 'utf8'))).toEqual({
      COHERE_API_KEY: 'test-cohere-key',
      PEXELS_API_KEY: 'test-pexels-key',
    });

    loadWorkspaceEnv(repoRoot);

    expect(process.env['COHERE_API_KEY']).toBe('test-cohere-key');
    expect(process.env['PEXELS_API_KEY']).toBe('test-pexels-key');
  });

  it('does not override variables already set in the environment', () => {
    persistWorkspaceEnv(repoRoot, { ELEVENLABS_API_KEY: 'from-file' });
    process.env['ELEVENLABS_API_KEY'] = 'from-shell';

    loadWorkspaceEnv(repoRoot);

    expect(process.env['ELEVENLABS_API_KEY']).toBe('from-shell');
  });

  it('ignores an env file that is not a string map', () => {
    writeFileSync(join(repoRoot, '.shortsmith', 'env.json'), JSON.stringify({ COHERE_API_KEY: 42 }));
    loadWorkspaceEnv(repoRoot);
    expect(process.env['COHERE_API_KEY']).toBeUndefined();
  });

  it('reads trimmed credentials and drops blank ones', () => {
    expect(
      loadProviderCredentials({ COHERE_API_KEY: ' test-secret ', PEXELS_API_KEY: '   ' }),
    ).toEqual({
      cohereApiKey: 'test-secret',
      pexelsApiKey: undefined,
      elevenLabsApiKey: undefined,
      youtubeAccessToken: undefined,
    });
  });
});
