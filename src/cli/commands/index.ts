import type { Command } from 'commander';
import { withEngine, printJson } from '../shared.js';
import { formatIndexReport } from '../../formatting/resultFormatter.js';
import { logger } from '../../logging/logger.js';

export function registerIndexCommand(program: Command): void {
  program
    .command('index <directory>')
    .description('Index a project directory; unchanged chunks keep their vectors')
    .option('--reset', 'Ignore the existing index and re-embed everything (use after switching embedders)')
    .option('--json', 'Print the report as JSON')
    .action(async (directory: string, options: { reset?: boolean; json?: boolean }) => {
      await withEngine(async (engine) => {
        logger.info(`${options.reset ? 'Re-indexing' : 'Indexing'} ${directory}...`);
        const report = await engine.indexProject(directory, { reset: options.reset === true });
        if (options.json) printJson(report);
        else process.stdout.write(`${formatIndexReport(report)}\n`);
        if (report.filesFailed.length > 0) process.exitCode = 2;
      });
    });
}
