import type { Command } from 'commander';
import { printJson, withEngine } from '../shared.js';
import { formatProjectMap } from '../../formatting/resultFormatter.js';

export function registerMapCommand(program: Command): void {
  program
    .command('map [directory]')
    .description('Cluster an indexed project into components')
    .option('--json', 'Print the graph as JSON')
    .action(async (directory: string | undefined, opts: { json?: boolean }) => {
      await withEngine(async (engine) => {
        const graph = await engine.projectMap(directory ?? process.cwd());
        if (opts.json) printJson(graph);
        else process.stdout.write(`${formatProjectMap(graph)}\n`);
      });
    });
}
