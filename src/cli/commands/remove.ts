import type { Command } from 'commander';
import { resolve } from 'node:path';
import { withEngine } from '../shared.js';

export function registerRemoveCommand(program: Command): void {
  program
    .command('remove <directory>')
    .description("Delete a project's index")
    .action(async (directory: string) => {
      await withEngine(async (engine) => {
        const removed = await engine.removeProject(directory);
        const root = resolve(directory);
        process.stdout.write(removed ? `Removed index for ${root}\n` : `${root} was not indexed\n`);
      });
    });
}
