import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { dump, load } from 'js-yaml';
import { ZodError } from 'zod';
import type { StudioConfig } from './types.js';
import { StudioConfigSchema, formatZodError } from '../shared/schemas.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate a parsed config document. Missing keys take their defaults; an
 * invalid value raises a ConfigError naming its path.
 */
export function parseStudioConfig(raw: unknown): StudioConfig {
  try {
    return StudioConfigSchema.parse(raw ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`Invalid config: ${formatZodError(err)}`);
    }
    throw err;
  }
}

export function defaultStudioConfig(): StudioConfig {
  return parseStudioConfig({});
}

export function readStudioConfig(configPath: string): StudioConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError('Workspace not initialized. Run `shortsmith init` first.');
  }
  return parseStudioConfig(load(readFileSync(configPath, 'utf8')));
}

export function writeStudioConfig(configPath: string, config: StudioConfig): void {
  writeFileSync(configPath, dump(config), 'utf8');
}
