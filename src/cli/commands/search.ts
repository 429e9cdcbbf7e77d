import type { Command } from 'commander';
import { parseCount, printJson, withEngine } from '../shared.js';
import { formatSearchResults } from '../../formatting/resultFormatter.js';
import { DEFAULT_MODIFIED_COMMITS } from '../../context/localContextAdapter.js';

interface SearchOptions {
  project: string;
  top: number;
  modified?: boolean;
  commits: number;
  json?: boolean;
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search <query>')
    .description('Search an indexed project')
    .option('-p, --project <dir>', 'Project directory', process.cwd())
    .option('--top <n>', 'Max results', parseCount, 5)
    .option('--modified', 'Only search files changed in git (working tree and recent commits)')
    .option('--commits <n>', 'Recent commits included by --modified', parseCount, DEFAULT_MODIFIED_COMMITS)
    .option('--json', 'Print hits as JSON')
    .action(async (query: string, opts: SearchOptions) => {
      await withEngine(async (engine) => {
        const hits = opts.modified
          ? (await engine.searchModifiedFiles(query, opts.project, opts.top, opts.commits)).hits
          : await engine.search(query, opts.project, opts.top);
        if (opts.json) {
          printJson(hits);
          return;
        }
        process.stdout.write(formatSearchResults(hits, query) || `No results found for: ${query}`);
        process.stdout.write('\n');
      });
    });
}
