import type { Command } from 'commander';
import { requireStudio } from '../cli-shared.js';
import { logger } from '../../shared/logger.js';
import { errorMessage } from '../../shared/errors.js';

interface WorkerOpts {
  poll: string;
  cwd: string;
}

export function registerWorkerCommand(program: Command): void {
  program
    .command('worker')
    .description('Process queued jobs until interrupted')
    .option('--poll <seconds>', 'How often to pick up jobs created by other processes', '5')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: WorkerOpts) => {
      const pollSeconds = Number(opts.poll);
      if (!Number.isFinite(pollSeconds) || pollSeconds <= 0) {
        console.error(`Invalid poll interval: ${opts.poll}`);
        process.exit(1);
      }

      const studio = requireStudio(opts.cwd);
      studio.recover();
      studio.start();

      const timer = setInterval(() => studio.recover(), pollSeconds * 1000);
      console.log(`Worker running (${studio.options.config.pipeline.max_concurrent_jobs} concurrent). Press Ctrl+C to stop.`);

      const shutdown = () => {
        clearInterval(timer);
        console.log('\nStopping; waiting for running jobs to reach a checkpoint...');
        studio
          .stop()
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            logger.error('Worker shutdown failed', { error: errorMessage(err) });
            process.exit(1);
          });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
}
