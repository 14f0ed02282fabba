import type { Command } from 'commander';
import { requireStudio, formatJobDetail } from '../cli-shared.js';
import { SubmitJobSchema, formatZodError } from '../../shared/schemas.js';
import { errorMessage } from '../../shared/errors.js';

interface GenerateOpts {
  channel: string;
  topic?: string;
  priority: string;
  wait: boolean;
  cwd: string;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Create a video job for a channel')
    .requiredOption('-c, --channel <name>', 'Channel to produce for')
    .option('-t, --topic <topic>', 'Topic; omitted means pick from trends')
    .option('-p, --priority <priority>', 'low, normal, high or critical', 'normal')
    .option('--wait', 'Run the job in this process until it settles', false)
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(async (opts: GenerateOpts) => {
      const parsed = SubmitJobSchema.safeParse({
        channel: opts.channel,
        topic: opts.topic,
        priority: opts.priority,
      });
      if (!parsed.success) {
        console.error(`Invalid job: ${formatZodError(parsed.error)}`);
        process.exit(1);
      }

      const studio = requireStudio(opts.cwd);
      try {
        if (!opts.wait) {
          const job = studio.engine.createJob(parsed.data);
          console.log(`Queued ${job.id} for ${job.channel}. A running worker will pick it up.`);
          return;
        }

        const job = studio.submit(parsed.data);
        console.log(`Running ${job.id}...`);
        const settled = studio.waitForJob(job.id);
        studio.start();
        const status = await settled;
        await studio.stop();

        const view = studio.status(job.id);
        console.log(`\nJob ${status}.`);
        for (const line of formatJobDetail(view.job, view.lastError)) console.log(line);
        if (status === 'suspended') {
          console.log(`\nReview with: shortsmith approvals approve ${job.id}`);
        }
        if (status === 'failed') process.exitCode = 1;
      } catch (err) {
        await studio.stop();
        console.error(`Failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
