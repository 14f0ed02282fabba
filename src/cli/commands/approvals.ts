import type { Command } from 'commander';
import { requireStudio } from '../cli-shared.js';
import { ApprovalListQuerySchema, formatZodError } from '../../shared/schemas.js';
import { errorMessage } from '../../shared/errors.js';

interface DecideOpts {
  reason?: string;
  actor: string;
  cwd: string;
}

export function registerApprovalsCommand(program: Command): void {
  const approvals = program
    .command('approvals')
    .description('Review videos waiting for human approval');

  approvals
    .command('list')
    .description('List approval requests')
    .option('--status <status>', 'Filter by status: pending, approved, denied')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: { status?: string; cwd: string }) => {
      const filter = ApprovalListQuerySchema.safeParse({ status: opts.status });
      if (!filter.success) {
        console.error(`Invalid filter: ${formatZodError(filter.error)}`);
        process.exit(1);
      }
      const items = requireStudio(opts.cwd).approvals.list(filter.data);

      if (items.length === 0) {
        console.log('No approvals found.');
        return;
      }

      console.log(`\nApprovals (${items.length}):\n`);
      for (const a of items) {
        const status = a.status.toUpperCase().padEnd(8);
        console.log(`  [${status}] ${a.job_id}`);
        console.log(`          Channel: ${a.summary.channel}`);
        console.log(`          Title:   ${a.summary.title}`);
        if (a.summary.qualityScore !== null) console.log(`          Quality: ${a.summary.qualityScore}`);
        if (a.summary.videoPath) console.log(`          Video:   ${a.summary.videoPath}`);
        console.log(`          Created: ${a.created_at}`);
        if (a.actor) console.log(`          Actor:   ${a.actor}`);
        if (a.decided_at) console.log(`          Decided: ${a.decided_at}`);
        if (a.decision_reason) console.log(`          Reason:  ${a.decision_reason}`);
        console.log();
      }
    });

  const decide = (decision: 'approve' | 'reject', verb: string) =>
    async (jobId: string, opts: DecideOpts) => {
      const studio = requireStudio(opts.cwd);
      try {
        const job = await studio.resolveApproval(jobId, decision, opts.reason, opts.actor);
        console.log(`${verb}: ${job.id} (now ${job.stage}, ${job.status})`);
      } catch (err) {
        console.error(`Failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    };

  approvals
    .command('approve <jobId>')
    .description('Approve a video for upload')
    .option('--reason <reason>', 'Reason for decision')
    .option('--actor <name>', 'Who decided', 'cli')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(decide('approve', 'Approved'));

  approvals
    .command('reject <jobId>')
    .description('Reject a video; the job fails')
    .option('--reason <reason>', 'Reason for decision')
    .option('--actor <name>', 'Who decided', 'cli')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(decide('reject', 'Rejected'));
}
