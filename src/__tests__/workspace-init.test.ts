import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { initWorkspace } from '../workspace/init.js';
import { readStudioConfig } from '../workspace/config.js';
import { closeDb } from '../workspace/db.js';

describe('initWorkspace', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'shortsmith-ws-init-'));
    closeDb();
  });

  afterEach(() => {
    closeDb();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates .shortsmith/ directory structure', () => {
    const { config, paths } = initWorkspace({ cwd: tmpDir });
    expect(paths.root).toBe(join(tmpDir, '.shortsmith'));
    expect(existsSync(join(tmpDir, '.shortsmith/config.yaml'))).toBe(true);
    expect(existsSync(join(tmpDir, '.shortsmith/state.db'))).toBe(true);
    expect(existsSync(join(tmpDir, '.shortsmith/output/video'))).toBe(true);
    expect(existsSync(join(tmpDir, '.shortsmith/output/thumbnails'))).toBe(true);
    expect(existsSync(join(tmpDir, '.shortsmith/tmp'))).toBe(true);
    expect(config.pipeline.max_concurrent_jobs).toBe(3);
  });

  it('writes a config that reads back unchanged', () => {
    const { config, paths } = initWorkspace({ cwd: tmpDir });
    expect(readStudioConfig(paths.config)).toEqual(config);
  });

  it('throws if workspace already exists without --force', () => {
    initWorkspace({ cwd: tmpDir });
    closeDb();
    expect(() => initWorkspace({ cwd: tmpDir })).toThrow('already exists');
  });

  it('reinitializes with --force', () => {
    initWorkspace({ cwd: tmpDir });
    closeDb();
    expect(initWorkspace({ cwd: tmpDir, force: true }).config.youtube.max_daily_uploads).toBe(3);
  });
});
