import type { Command } from 'commander';
import { printJson, withEngine } from '../shared.js';
import { formatEmbeddingStatus } from '../../formatting/resultFormatter.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status [directory]')
    .description('Show the active embedding provider; with a directory, also check its index against the store')
    .option('--json', 'Print as JSON')
    .action(async (directory: string | undefined, opts: { json?: boolean }) => {
      await withEngine(async (engine) => {
        const embedding = await engine.embeddingStatus();
        const verify = directory !== undefined ? await engine.verify(directory) : undefined;
        if (opts.json) {
          printJson({ embedding, ...(verify !== undefined && { verify }) });
          return;
        }
        process.stdout.write(`${formatEmbeddingStatus(embedding)}\n`);
        if (verify) {
          process.stdout.write(
            verify.consistent
              ? `Index for ${verify.projectRoot} is consistent\n`
              : `Index for ${verify.projectRoot} is inconsistent: ${verify.missingFromStore.length} chunk(s) ` +
                  `missing from the store, ${verify.extraInStore.length} unexpected; run index --reset\n`,
          );
          if (!verify.consistent) process.exitCode = 2;
        }
      });
    });
}
