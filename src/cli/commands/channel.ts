import type { Command } from 'commander';
import { requireStudio } from '../cli-shared.js';
import { ChannelInputSchema, formatZodError } from '../../shared/schemas.js';
import { channelFromInput } from '../../state/channels.js';
import { errorMessage } from '../../shared/errors.js';

interface AddOpts {
  niche: string;
  tier: string;
  voice?: string;
  colors?: string;
  watermark?: string;
  cwd: string;
}

export function registerChannelCommand(program: Command): void {
  const channel = program.command('channel').description('Manage channels');

  channel
    .command('add <name>')
    .description('Create or update a channel')
    .requiredOption('--niche <niche>', 'Content niche, used as the trend query')
    .option('--tier <tier>', 'Quality tier: standard or premium', 'standard')
    .option('--voice <voiceId>', 'Voice id for voiceovers')
    .option('--colors <list>', 'Comma-separated brand colors')
    .option('--watermark <path>', 'Watermark image')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((name: string, opts: AddOpts) => {
      const parsed = ChannelInputSchema.safeParse({
        name,
        niche: opts.niche,
        quality_tier: opts.tier,
        branding: {
          voice_id: opts.voice,
          color_scheme: opts.colors?.split(',').map((c) => c.trim()).filter(Boolean),
          watermark: opts.watermark,
        },
      });
      if (!parsed.success) {
        console.error(`Invalid channel: ${formatZodError(parsed.error)}`);
        process.exit(1);
      }
      const studio = requireStudio(opts.cwd);
      const existing = studio.store.loadChannel(name);
      studio.store.saveChannel(channelFromInput(parsed.data, existing));
      console.log(`${existing ? 'Updated' : 'Created'} channel ${name} (${parsed.data.quality_tier})`);
    });

  channel
    .command('list')
    .description('List channels')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: { cwd: string }) => {
      const channels = requireStudio(opts.cwd).store.listChannels();
      if (channels.length === 0) {
        console.log('No channels found.');
        return;
      }
      console.log(`\nChannels (${channels.length}):\n`);
      for (const c of channels) {
        console.log(`  ${c.name.padEnd(16)} ${c.niche.padEnd(20)} ${c.qualityTier.padEnd(9)} uploads today: ${c.dailyUploads}`);
      }
    });

  channel
    .command('show <name>')
    .description('Show a channel')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((name: string, opts: { cwd: string }) => {
      const found = requireStudio(opts.cwd).store.loadChannel(name);
      if (!found) {
        console.error(`Channel ${name} not found`);
        process.exit(1);
      }
      console.log(JSON.stringify(found, null, 2));
    });

  channel
    .command('remove <name>')
    .description('Delete a channel with no unfinished jobs')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((name: string, opts: { cwd: string }) => {
      try {
        requireStudio(opts.cwd).store.deleteChannel(name);
        console.log(`Removed channel ${name}`);
      } catch (err) {
        console.error(`Failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
