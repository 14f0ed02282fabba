#!/usr/bin/env node
import { Command } from 'commander';
import { errorMessage } from '../shared/errors.js';
import { registerInitCommand } from './commands/init.js';
import { registerChannelCommand } from './commands/channel.js';
import { registerGenerateCommand } from './commands/generate.js';
import { registerWorkerCommand } from './commands/worker.js';
import { registerJobsCommand } from './commands/jobs.js';
import { registerApprovalsCommand } from './commands/approvals.js';
import { registerQualityCommand } from './commands/quality.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerServeCommand } from './commands/serve.js';

const program = new Command();

program
  .name('shortsmith')
  .description('shortsmith: short-form video production pipeline')
  .version('0.1.0');

registerInitCommand(program);
registerChannelCommand(program);
registerGenerateCommand(program);
registerWorkerCommand(program);
registerJobsCommand(program);
registerApprovalsCommand(program);
registerQualityCommand(program);
registerStatsCommand(program);
registerServeCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
