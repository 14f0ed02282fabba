import type { Command } from 'commander';
import { requireStudio } from '../cli-shared.js';

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show job totals and provider circuit states')
    .option('--json', 'Print as JSON', false)
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: { json: boolean; cwd: string }) => {
      const stats = requireStudio(opts.cwd).stats();
      if (opts.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }
      const { jobs } = stats;
      console.log('\nJobs:');
      console.log(`  pending ${jobs.pending}  running ${jobs.running}  succeeded ${jobs.succeeded}  failed ${jobs.failed}  cancelled ${jobs.cancelled}`);
      console.log(`  success rate: ${stats.successRate === null ? 'n/a' : `${stats.successRate}%`}`);
      const circuits = Object.entries(stats.circuits);
      if (circuits.length > 0) {
        console.log('\nCircuits:');
        for (const [id, state] of circuits) {
          console.log(`  ${id.padEnd(24)} ${state.status.padEnd(10)} failures ${state.consecutiveFailures}`);
        }
      }
    });
}
