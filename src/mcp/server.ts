import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { resolve } from 'node:path';
import type { ContextEngine } from '../context/contextEngine.js';
import { DEFAULT_CONTEXT_LINES } from '../context/contextExpander.js';
import { DEFAULT_MODIFIED_COMMITS } from '../context/localContextAdapter.js';
import { toErrorPayload } from '../errors/base.js';
import { formatChunkContext, formatProjectMap, formatSearchResults } from '../formatting/resultFormatter.js';
import { logger } from '../logging/logger.js';

export interface McpServerDeps {
  contextEngine: ContextEngine;
  version?: string;
}

export const PROJECTS_RESOURCE_URI = 'code-atlas://projects';

const DEFAULT_TOP_K = 5;

function text(body: string): CallToolResult {
  return { content: [{ type: 'text', text: body }] };
}

function json(value: unknown): CallToolResult {
  return text(JSON.stringify(value, null, 2));
}

/** Every failure becomes `isError` with a `{kind, message}` body. */
async function run(tool: string, body: () => Promise<CallToolResult>): Promise<CallToolResult> {
  try {
    return await body();
  } catch (err) {
    const payload = toErrorPayload(err);
    logger.warn(`${tool} failed: ${payload.kind}: ${payload.message}`);
    return { isError: true, content: [{ type: 'text', text: JSON.stringify(payload) }] };
  }
}

const projectPath = z.string().min(1).describe('Absolute path to the project directory');
const topK = z.number().int().min(1).max(100).optional().describe(`Max results (default ${DEFAULT_TOP_K})`);

/**
 * Creates and wires up a McpServer with all tools, resources, and prompts.
 * All registrations happen before connect; the caller then must call server.connect(transport).
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const { contextEngine } = deps;

  const server = new McpServer({
    name: 'code-atlas',
    version: deps.version ?? '0.1.0',
  });

  // ── Resources ───────────────────────────────────────────────────────────

  server.resource(
    'indexed-projects',
    PROJECTS_RESOURCE_URI,
    { description: 'Indexed projects with file and chunk counts, embedding identity and last update.' },
    async () => ({
      contents: [
        {
          uri: PROJECTS_RESOURCE_URI,
          mimeType: 'application/json',
          text: JSON.stringify(await contextEngine.listProjects()),
        },
      ],
    }),
  );

  // ── Prompts ──────────────────────────────────────────────────────────────

  server.prompt(
    'code_context',
    {
      query: z.string().describe('Natural-language query to retrieve code context for'),
      project_path: z.string().describe('Absolute path to an indexed project'),
      maxResults: z.string().optional().describe(`Max number of results (default ${DEFAULT_TOP_K})`),
    },
    async ({ query, project_path, maxResults }) => {
      const top = maxResults ? parseInt(maxResults, 10) : DEFAULT_TOP_K;
      const hits = await contextEngine.search(query, project_path, top);
      return {
        messages: [
          {
            role: 'user' as const,
            content: {
              type: 'text' as const,
              text: formatSearchResults(hits, query) || `No codebase context found for: ${query}`,
            },
          },
        ],
      };
    },
  );

  // ── Tools ────────────────────────────────────────────────────────────────

  server.tool(
    'index_project',
    'Index a project directory. Unchanged chunks keep their stored vectors.',
    { path: projectPath },
    ({ path }) => run('index_project', async () => json(await contextEngine.indexProject(path))),
  );

  server.tool(
    'reindex_project',
    'Re-index a project from scratch with the active embedding provider. Use after switching providers.',
    { path: projectPath },
    ({ path }) => run('reindex_project', async () => json(await contextEngine.indexProject(path, { reset: true }))),
  );

  server.tool(
    'search_code',
    'Semantic search over an indexed project. Returns the most relevant chunks with file paths, line ranges and ids.',
    {
      query: z.string().describe('Natural-language query or code pattern'),
      project_path: projectPath,
      top_k: topK,
    },
    ({ query, project_path, top_k }) =>
      run('search_code', async () => {
        const hits = await contextEngine.search(query, project_path, top_k ?? DEFAULT_TOP_K);
        return text(formatSearchResults(hits, query) || `No results found for: ${query}`);
      }),
  );

  server.tool(
    'search_modified_files',
    'Semantic search restricted to files changed in the git working tree or the last N commits.',
    {
      query: z.string().describe('Natural-language query or code pattern'),
      project_path: projectPath,
      top_k: topK,
      commits: z
        .number()
        .int()
        .min(1)
        .optional()
        .describe(`Recent commits to include (default ${DEFAULT_MODIFIED_COMMITS})`),
    },
    ({ query, project_path, top_k, commits }) =>
      run('search_modified_files', async () => {
        const { files, hits } = await contextEngine.searchModifiedFiles(
          query,
          project_path,
          top_k ?? DEFAULT_TOP_K,
          commits ?? DEFAULT_MODIFIED_COMMITS,
        );
        if (files.length === 0) return text(`No modified files in ${resolve(project_path)}`);
        const header = `Searched ${files.length} modified file(s): ${files.join(', ')}`;
        return text(`${header}\n\n${formatSearchResults(hits, query) || `No results found for: ${query}`}`);
      }),
  );

  server.tool(
    'generate_project_map',
    'Cluster an indexed project into components by embedding similarity and list their relationships.',
    { project_path: projectPath },
    ({ project_path }) =>
      run('generate_project_map', async () => {
        const graph = await contextEngine.projectMap(project_path);
        return {
          content: [
            { type: 'text', text: formatProjectMap(graph) },
            { type: 'text', text: JSON.stringify(graph, null, 2) },
          ],
        };
      }),
  );

  server.tool(
    'get_chunk_context',
    'Show the lines around a chunk returned by search_code, read from the file as it is now.',
    {
      project_path: projectPath,
      chunk_id: z.string().min(1).describe('The id attribute of a search result'),
      context_before: z.number().int().min(0).optional().describe(`Lines before (default ${DEFAULT_CONTEXT_LINES})`),
      context_after: z.number().int().min(0).optional().describe(`Lines after (default ${DEFAULT_CONTEXT_LINES})`),
    },
    ({ project_path, chunk_id, context_before, context_after }) =>
      run('get_chunk_context', async () =>
        text(formatChunkContext(await contextEngine.chunkContext(project_path, chunk_id, context_before, context_after))),
      ),
  );

  server.tool(
    'watch_project',
    'Start or stop re-indexing a project as its files change, or list watched projects.',
    {
      project_path: projectPath,
      action: z.enum(['start', 'stop', 'status']).optional().describe('Default: start'),
    },
    ({ project_path, action }) =>
      run('watch_project', async () => {
        const root = resolve(project_path);
        switch (action ?? 'start') {
          case 'start': {
            const changed = await contextEngine.watch(root);
            return json({ projectRoot: root, state: contextEngine.watchState(root), changed });
          }
          case 'stop': {
            const changed = await contextEngine.unwatch(root);
            return json({ projectRoot: root, state: contextEngine.watchState(root), changed });
          }
          case 'status':
            return json({ projectRoot: root, state: contextEngine.watchState(root), watched: contextEngine.watchedProjects() });
        }
      }),
  );

  server.tool('list_indexed_projects', 'List every indexed project.', () =>
    run('list_indexed_projects', async () => json(await contextEngine.listProjects())),
  );

  server.tool('get_embedding_status', 'Show the active embedding provider, model and dimensions.', () =>
    run('get_embedding_status', async () => json(await contextEngine.embeddingStatus())),
  );

  server.tool(
    'remove_project',
    'Stop watching a project and delete its index.',
    { project_path: projectPath },
    ({ project_path }) =>
      run('remove_project', async () => {
        const removed = await contextEngine.removeProject(project_path);
        return json({ projectRoot: resolve(project_path), removed });
      }),
  );

  return server;
}

/**
 * Starts the MCP server over stdio. Logs only to stderr.
 */
export async function startMcpServer(deps: McpServerDeps): Promise<McpServer> {
  const server = createMcpServer(deps);
  const transport = new StdioServerTransport();
  logger.info('MCP server starting on stdio');
  await server.connect(transport);
  logger.info('MCP server connected');
  return server;
}
