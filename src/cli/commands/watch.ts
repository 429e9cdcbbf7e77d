import type { Command } from 'commander';
import { openEngine, waitForShutdown } from '../shared.js';
import { NotIndexedError } from '../../errors/context.js';
import { formatIndexReport } from '../../formatting/resultFormatter.js';
import { logger } from '../../logging/logger.js';

export function registerWatchCommand(program: Command): void {
  program
    .command('watch [directory]')
    .description('Re-index a project as its files change, until interrupted')
    .option('--index', 'Run a full index first when the project is not indexed yet')
    .action(async (directory: string | undefined, opts: { index?: boolean }) => {
      const root = directory ?? process.cwd();
      const { engine } = openEngine();
      try {
        try {
          await engine.watch(root);
        } catch (err) {
          if (!(err instanceof NotIndexedError) || !opts.index) throw err;
          process.stdout.write(`${formatIndexReport(await engine.indexProject(root))}\n`);
          await engine.watch(root);
        }
        const signal = await waitForShutdown();
        logger.info(`Received ${signal}, stopping`);
      } finally {
        await engine.dispose();
      }
    });
}
