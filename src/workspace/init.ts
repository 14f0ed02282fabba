import { mkdirSync, existsSync } from 'node:fs';
import { getStudioPaths, outputDirs } from './paths.js';
import { openDb } from './db.js';
import { defaultStudioConfig, writeStudioConfig } from './config.js';
import type { StudioConfig, StudioPaths } from './types.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
}

export interface InitResult {
  config: StudioConfig;
  paths: StudioPaths;
}

/**
 * Create .shortsmith/ with a default config.yaml, the output tree and the
 * state database. With `force`, an existing config is overwritten; jobs and
 * channels in the database are kept.
 */
export function initWorkspace(opts: InitOptions = {}): InitResult {
  const paths = getStudioPaths(opts.cwd);

  if (existsSync(paths.config) && !opts.force) {
    throw new Error(`Workspace already exists at ${paths.root}. Use --force to reinitialize.`);
  }

  for (const dir of [paths.root, ...outputDirs(paths)]) {
    mkdirSync(dir, { recursive: true });
  }

  const config = defaultStudioConfig();
  writeStudioConfig(paths.config, config);

  // Creates the schema
  openDb(paths.stateDb);

  return { config, paths };
}
