import type { Command } from 'commander';
import { startServer } from '../../api/server.js';

interface ServeOpts {
  host?: string;
  port?: string;
  worker: boolean;
  cwd: string;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the local HTTP API')
    .option('--host <host>', 'Bind host (default from config: 127.0.0.1)')
    .option('--port <port>', 'Port (default from config: 7810)')
    .option('--worker', 'Also process queued jobs in this process', false)
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(async (opts: ServeOpts) => {
      const port = opts.port ? parseInt(opts.port, 10) : undefined;
      console.log('Starting shortsmith API...');
      console.log('Press Ctrl+C to stop\n');
      await startServer({ cwd: opts.cwd, host: opts.host, port, worker: opts.worker });
    });
}
