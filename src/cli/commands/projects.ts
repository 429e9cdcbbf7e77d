import type { Command } from 'commander';
import { printJson, withEngine } from '../shared.js';
import { formatProjects } from '../../formatting/resultFormatter.js';

export function registerProjectsCommand(program: Command): void {
  program
    .command('projects')
    .description('List indexed projects')
    .option('--json', 'Print as JSON')
    .action(async (opts: { json?: boolean }) => {
      await withEngine(async (engine) => {
        const projects = await engine.listProjects();
        if (opts.json) printJson(projects);
        else process.stdout.write(`${formatProjects(projects)}\n`);
      });
    });
}
