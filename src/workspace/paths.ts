import { join } from 'node:path';
import type { StudioPaths } from './types.js';

export const WORKSPACE_DIR = '.shortsmith';

export function getStudioPaths(cwd: string = process.cwd()): StudioPaths {
  const root = join(cwd, WORKSPACE_DIR);
  const outputDir = join(root, 'output');
  return {
    root,
    config: join(root, 'config.yaml'),
    envFile: join(root, 'env.json'),
    stateDb: join(root, 'state.db'),
    outputDir,
    audioDir: join(outputDir, 'audio'),
    videoDir: join(outputDir, 'video'),
    thumbnailDir: join(outputDir, 'thumbnails'),
    assetDir: join(outputDir, 'assets'),
    uploadedDir: join(outputDir, 'uploaded'),
    tmpDir: join(root, 'tmp'),
  };
}

export function outputDirs(paths: StudioPaths): string[] {
  return [
    paths.outputDir,
    paths.audioDir,
    paths.videoDir,
    paths.thumbnailDir,
    paths.assetDir,
    paths.uploadedDir,
    paths.tmpDir,
  ];
}
