import type { Command } from 'commander';
import { parseCount, withEngine } from '../shared.js';
import { formatChunkContext } from '../../formatting/resultFormatter.js';
import { DEFAULT_CONTEXT_LINES } from '../../context/contextExpander.js';

export function registerContextCommand(program: Command): void {
  program
    .command('context <chunkId>')
    .description('Show the lines around an indexed chunk')
    .option('-p, --project <dir>', 'Project directory', process.cwd())
    .option('-B, --before <n>', 'Lines before the chunk', parseCount, DEFAULT_CONTEXT_LINES)
    .option('-A, --after <n>', 'Lines after the chunk', parseCount, DEFAULT_CONTEXT_LINES)
    .action(async (chunkId: string, opts: { project: string; before: number; after: number }) => {
      await withEngine(async (engine) => {
        const context = await engine.chunkContext(opts.project, chunkId, opts.before, opts.after);
        process.stdout.write(`${formatChunkContext(context)}\n`);
      });
    });
}
