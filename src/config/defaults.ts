import type { AppConfig, ProviderName } from '../types/config.types.js';
import { homedir } from 'node:os';
import { join } from 'node:path';

/** Probe order when `embedding.provider` is `auto`. */
export const PROVIDER_PRIORITY: readonly ProviderName[] = ['ollama', 'google', 'openai', 'voyage'];

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  ollama: 'nomic-embed-text',
  google: 'text-embedding-004',
  openai: 'text-embedding-3-small',
  voyage: 'voyage-3-lite',
};

export const DEFAULT_DIMENSIONS: Record<ProviderName, number> = {
  ollama: 768,
  google: 768,
  openai: 1536,
  voyage: 512,
};

export const DEFAULT_CONFIG: AppConfig = {
  dataDir: join(homedir(), '.code-atlas'),
  logLevel: 'info',
  embedding: {
    provider: 'auto',
    models: {},
    dimensions: {},
    ollamaBaseUrl: 'http://localhost:11434',
    timeoutMs: 60_000,
    maxAttempts: 3,
    retryBaseDelayMs: 1_000,
  },
  chunking: {
    windowLines: 50,
    overlapLines: 12,
    maxDefinitionLines: 200,
    maxChunkLines: 120,
    statementGapLines: 2,
  },
  watch: {
    debounceMs: 500,
  },
  topology: {
    clusterThreshold: 0.7,
    edgeThreshold: 0.5,
    representatives: 3,
  },
  store: 'sqlite',
};
