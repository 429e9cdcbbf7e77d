import type { Command } from 'commander';
import { openEngine, waitForShutdown } from '../shared.js';
import { startMcpServer } from '../../mcp/server.js';
import { logger } from '../../logging/logger.js';

export function registerMcpCommand(program: Command, version: string): void {
  program
    .command('mcp')
    .description('Start the MCP server over stdio')
    .action(async () => {
      const { engine } = openEngine();
      const server = await startMcpServer({ contextEngine: engine, version });
      const closed = new Promise<string>((resolve) => {
        server.server.onclose = () => resolve('transport closed');
      });
      const reason = await Promise.race([closed, waitForShutdown()]);
      logger.info(`MCP server stopping (${reason})`);
      await server.close();
      await engine.dispose();
    });
}
