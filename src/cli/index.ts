#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { registerIndexCommand } from './commands/index.js';
import { registerSearchCommand } from './commands/search.js';
import { registerMapCommand } from './commands/map.js';
import { registerContextCommand } from './commands/context.js';
import { registerWatchCommand } from './commands/watch.js';
import { registerProjectsCommand } from './commands/projects.js';
import { registerStatusCommand } from './commands/status.js';
import { registerRemoveCommand } from './commands/remove.js';
import { registerMcpCommand } from './commands/mcp.js';

const pkg = z
  .object({ version: z.string(), description: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8')));

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('code-atlas')
    .description(pkg.description)
    .version(pkg.version);

  registerIndexCommand(program);
  registerSearchCommand(program);
  registerMapCommand(program);
  registerContextCommand(program);
  registerWatchCommand(program);
  registerProjectsCommand(program);
  registerStatusCommand(program);
  registerRemoveCommand(program);
  registerMcpCommand(program, pkg.version);

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[code-atlas] Error: ${message}\n`);
  process.exit(1);
});
