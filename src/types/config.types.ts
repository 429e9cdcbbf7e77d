export type ProviderName = 'ollama' | 'google' | 'openai' | 'voyage';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface EmbeddingConfig {
  /** `auto` probes providers in priority order; a provider name skips the probe. */
  provider: ProviderName | 'auto';
  models: Partial<Record<ProviderName, string>>;
  /** Overrides the advertised vector dimension of a provider's model. */
  dimensions: Partial<Record<ProviderName, number>>;
  ollamaBaseUrl: string;
  /** Overrides the provider's own batch size when set. */
  batchSize?: number;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
}

export interface ChunkingConfig {
  windowLines: number;
  overlapLines: number;
  maxDefinitionLines: number;
  maxChunkLines: number;
  statementGapLines: number;
}

export interface WatchConfig {
  debounceMs: number;
}

export interface TopologyConfig {
  clusterThreshold: number;
  edgeThreshold: number;
  representatives: number;
}

export interface AppConfig {
  dataDir: string;
  logLevel: LogLevel;
  embedding: EmbeddingConfig;
  chunking: ChunkingConfig;
  watch: WatchConfig;
  topology: TopologyConfig;
  store: 'sqlite' | 'memory';
}
