import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { Command } from 'commander';
import { QualityGate } from '../../quality/gate.js';
import type { QualityInput, QualityReport } from '../../quality/gate.js';
import { QualityTierSchema } from '../../shared/schemas.js';
import { readStudioConfig, defaultStudioConfig } from '../../workspace/config.js';
import { getStudioPaths } from '../../workspace/paths.js';
import { errorMessage } from '../../shared/errors.js';

interface CheckOpts {
  tier: string;
  title?: string;
  duration?: string;
  video?: string;
  cwd: string;
}

/**
 * Build the gate input for a script file. The first non-empty line is the
 * title unless one is given; the rest is the spoken content.
 */
export function scriptInputFromText(text: string, opts: { title?: string; durationSeconds: number; videoPath?: string }): QualityInput {
  const lines = text.split(/\r?\n/).map((l) => l.trim());
  const firstIdx = lines.findIndex((l) => l.length > 0);
  const title = opts.title ?? (firstIdx >= 0 ? lines[firstIdx] ?? '' : '');
  const body = opts.title === undefined && firstIdx >= 0 ? lines.slice(firstIdx + 1) : lines;
  const content = body.join('\n').trim();
  const hashtags = content.match(/#\w+/g) ?? [];
  const input: QualityInput = {
    script: { title, content, durationSeconds: opts.durationSeconds, hashtags, generator: 'manual' },
  };
  if (opts.videoPath) {
    input.video = { path: opts.videoPath, sizeBytes: statSync(opts.videoPath).size };
  }
  return input;
}

export function formatQualityReport(report: QualityReport): string[] {
  const lines = [
    `Score:    ${report.score} (${report.tier} threshold ${report.threshold}, improve floor ${report.floor})`,
    `Decision: ${report.decision}`,
    `  readability ${report.subScores.readability}  engagement ${report.subScores.engagement}  structure ${report.subScores.structure}  accuracy ${report.subScores.accuracy}`,
  ];
  if (report.subScores.production !== undefined) {
    lines.push(`  production ${report.subScores.production}`);
  }
  for (const check of report.checks) {
    lines.push(`  ${check.passed ? 'ok  ' : 'FAIL'} ${check.name}: ${check.message}`);
  }
  if (report.blacklistHits.length > 0) {
    lines.push(`Blacklisted terms: ${report.blacklistHits.join(', ')}`);
  }
  return lines;
}

export function registerQualityCommand(program: Command): void {
  const quality = program.command('quality').description('Score scripts against the quality gate');

  quality
    .command('check <file>')
    .description('Score a script file (first line is the title)')
    .option('--tier <tier>', 'standard or premium', 'standard')
    .option('--title <title>', 'Title; defaults to the first line of the file')
    .option('--duration <seconds>', 'Target duration in seconds')
    .option('--video <path>', 'Rendered video to include in the production score')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((file: string, opts: CheckOpts) => {
      const tier = QualityTierSchema.safeParse(opts.tier);
      if (!tier.success) {
        console.error(`Invalid tier: ${opts.tier}. Must be standard or premium.`);
        process.exit(1);
      }
      try {
        const paths = getStudioPaths(opts.cwd);
        const config = existsSync(paths.config) ? readStudioConfig(paths.config) : defaultStudioConfig();
        const input = scriptInputFromText(readFileSync(file, 'utf8'), {
          title: opts.title,
          durationSeconds: opts.duration ? Number(opts.duration) : config.content.default_duration,
          videoPath: opts.video,
        });
        const report = new QualityGate(config.quality).evaluate(input, tier.data);
        console.log(`\n${basename(file)}`);
        for (const line of formatQualityReport(report)) console.log(line);
        if (report.decision === 'reject') process.exitCode = 2;
      } catch (err) {
        console.error(`Failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
