import type { Command } from 'commander';
import { requireStudio, formatJobDetail, formatJobLine } from '../cli-shared.js';
import { JobListQuerySchema, formatZodError } from '../../shared/schemas.js';
import { errorMessage } from '../../shared/errors.js';

interface ListOpts {
  status?: string;
  channel?: string;
  limit: string;
  cwd: string;
}

export function registerJobsCommand(program: Command): void {
  const jobs = program.command('jobs').description('Inspect and cancel jobs');

  jobs
    .command('list')
    .description('List jobs, newest first')
    .option('--status <status>', 'pending, running, succeeded, failed or cancelled')
    .option('--channel <name>', 'Only jobs for this channel')
    .option('--limit <n>', 'Maximum number of jobs', '20')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: ListOpts) => {
      const query = JobListQuerySchema.safeParse({ status: opts.status, channel: opts.channel, limit: opts.limit });
      if (!query.success) {
        console.error(`Invalid filter: ${formatZodError(query.error)}`);
        process.exit(1);
      }
      const items = requireStudio(opts.cwd).store.listJobs(query.data);
      if (items.length === 0) {
        console.log('No jobs found.');
        return;
      }
      console.log(`\nJobs (${items.length}):\n`);
      for (const job of items) console.log(formatJobLine(job));
    });

  jobs
    .command('show <id>')
    .description('Show a job with its latest error')
    .option('--history', 'Include stage history', false)
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((id: string, opts: { history: boolean; cwd: string }) => {
      try {
        const { job, lastError } = requireStudio(opts.cwd).status(id);
        for (const line of formatJobDetail(job, lastError)) console.log(line);
        if (opts.history) {
          console.log('\n  History:');
          for (const entry of job.stageHistory) {
            console.log(`    ${entry.at}  ${entry.stage.padEnd(15)} ${entry.event}${entry.detail ? ` (${entry.detail})` : ''}`);
          }
        }
      } catch (err) {
        console.error(`Failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  jobs
    .command('cancel <id>')
    .description('Cancel a job that is queued, deferred or awaiting approval')
    .option('--reason <reason>', 'Reason recorded on the job', 'cancelled from CLI')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(async (id: string, opts: { reason: string; cwd: string }) => {
      const studio = requireStudio(opts.cwd);
      try {
        const { job } = studio.status(id);
        if (job.status === 'running') {
          console.error(`Job ${id} is running in a worker. Cancel it through the worker's API: POST /v1/jobs/${id}/cancel`);
          process.exit(1);
        }
        await studio.cancel(id, opts.reason);
        console.log(`Cancelled: ${id}`);
      } catch (err) {
        console.error(`Failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
