import type { Command } from 'commander';
import { initWorkspace } from '../../workspace/init.js';
import { persistWorkspaceEnv } from '../../workspace/env.js';
import { errorMessage } from '../../shared/errors.js';

interface InitOpts {
  cwd: string;
  force: boolean;
  cohereKey?: string;
  pexelsKey?: string;
  elevenlabsKey?: string;
  youtubeToken?: string;
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a shortsmith workspace in the current directory')
    .option('--force', 'Reinitialize even if workspace already exists', false)
    .option('--cohere-key <key>', 'Cohere API key for script generation')
    .option('--pexels-key <key>', 'Pexels API key for stock footage')
    .option('--elevenlabs-key <key>', 'ElevenLabs API key for voiceover')
    .option('--youtube-token <token>', 'YouTube OAuth access token for uploads')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: InitOpts) => {
      try {
        const { config, paths } = initWorkspace({ cwd: opts.cwd, force: opts.force });
        const keys = {
          COHERE_API_KEY: opts.cohereKey,
          PEXELS_API_KEY: opts.pexelsKey,
          ELEVENLABS_API_KEY: opts.elevenlabsKey,
          YOUTUBE_ACCESS_TOKEN: opts.youtubeToken,
        };
        const provided = Object.values(keys).filter(Boolean).length;
        if (provided > 0) persistWorkspaceEnv(opts.cwd, keys);

        console.log(`\nWorkspace initialized at ${paths.root}`);
        console.log(`  Config:     ${paths.config}`);
        console.log(`  Output:     ${paths.outputDir}`);
        console.log(`  Upload via: ${config.providers.upload.join(', ')}`);
        if (provided > 0) console.log(`  Saved ${provided} provider key(s) to ${paths.envFile}`);
        console.log(`\nNext steps:`);
        console.log(`  shortsmith channel add <name> --niche <niche>`);
        console.log(`  shortsmith generate --channel <name> --topic "<topic>" --wait`);
        console.log(`  shortsmith serve --worker`);
      } catch (err) {
        console.error(`Init failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
