import { existsSync } from 'node:fs';
import { getStudioPaths } from '../workspace/paths.js';
import { Studio } from '../runtime/studio.js';
import type { ErrorHistoryEntry, Job } from '../state/types.js';

/**
 * Open the studio for an initialized workspace, or print an error and exit.
 * Use at the top of every CLI command that needs jobs, channels or providers.
 */
export function requireStudio(cwd?: string): Studio {
  const paths = getStudioPaths(cwd);
  if (!existsSync(paths.config)) {
    console.error('Workspace not initialized. Run: shortsmith init');
    process.exit(1);
  }
  return Studio.open(cwd);
}

export function formatJobLine(job: Job): string {
  const status = job.status.toUpperCase().padEnd(9);
  const topic = job.topic ?? '(trending)';
  return `  [${status}] ${job.id}  ${job.channel.padEnd(12)} ${job.stage.padEnd(15)} ${topic}`;
}

export function formatJobDetail(job: Job, lastError: ErrorHistoryEntry | null): string[] {
  const lines = [
    `Job ${job.id}`,
    `  Channel:   ${job.channel}`,
    `  Topic:     ${job.topic ?? '(trending)'}`,
    `  Stage:     ${job.stage}`,
    `  Status:    ${job.status}`,
    `  Priority:  ${job.priority}`,
    `  Created:   ${job.createdAt}`,
  ];
  if (job.qualityScore !== null) lines.push(`  Quality:   ${job.qualityScore}`);
  if (job.deferredUntil) lines.push(`  Deferred:  until ${job.deferredUntil}`);
  if (job.artifacts.script) lines.push(`  Title:     ${job.artifacts.script.title}`);
  if (job.artifacts.videoPath) lines.push(`  Video:     ${job.artifacts.videoPath}`);
  if (job.artifacts.externalVideoId) lines.push(`  Published: ${job.artifacts.externalVideoId}`);
  if (lastError) lines.push(`  Error:     ${lastError.kind} at ${lastError.stage}: ${lastError.reason}`);
  return lines;
}
