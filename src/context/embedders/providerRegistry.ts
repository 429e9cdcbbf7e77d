import type { EmbeddingProvider } from './embeddingProvider.js';
import type { EmbeddingConfig, ProviderName } from '../../types/config.types.js';
import type { EmbeddingStatus } from '../../types/context.types.js';
import { OllamaEmbedder } from './ollamaEmbedder.js';
import { GoogleEmbedder } from './googleEmbedder.js';
import { createOpenAIEmbedder, createVoyageEmbedder } from './openaiEmbedder.js';
import { BatchEmbedder } from './batchEmbedder.js';
import { DEFAULT_DIMENSIONS, DEFAULT_MODELS, PROVIDER_PRIORITY } from '../../config/defaults.js';
import { ProviderUnavailableError } from '../../errors/embedding.js';
import { logger } from '../../logging/logger.js';

export type ProviderFactory = (name: ProviderName, config: EmbeddingConfig, env: NodeJS.ProcessEnv) => EmbeddingProvider;

export function createProvider(name: ProviderName, config: EmbeddingConfig, env: NodeJS.ProcessEnv): EmbeddingProvider {
  const model = config.models[name] ?? DEFAULT_MODELS[name];
  const dimensions = config.dimensions[name] ?? DEFAULT_DIMENSIONS[name];
  switch (name) {
    case 'ollama':
      return new OllamaEmbedder(config.ollamaBaseUrl, model, dimensions);
    case 'google':
      return new GoogleEmbedder(env['GOOGLE_API_KEY'] ?? env['GEMINI_API_KEY'], model, dimensions);
    case 'openai':
      return createOpenAIEmbedder(env['OPENAI_API_KEY'], model, dimensions);
    case 'voyage':
      return createVoyageEmbedder(env['VOYAGE_API_KEY'], model, dimensions);
  }
}

const CREDENTIAL_HINT: Record<ProviderName, string> = {
  ollama: 'a running Ollama server',
  google: 'GOOGLE_API_KEY or GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  voyage: 'VOYAGE_API_KEY',
};

/**
 * Holds the one active embedding provider for the process. The first
 * resolve() probes providers in priority order; later calls reuse the
 * result until reset().
 */
export class ProviderRegistry {
  private pending: Promise<EmbeddingProvider> | null = null;

  constructor(
    private config: EmbeddingConfig,
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly factory: ProviderFactory = createProvider,
  ) {}

  resolve(): Promise<EmbeddingProvider> {
    if (!this.pending) {
      const attempt = this.select();
      this.pending = attempt;
      // a failed selection is not cached
      attempt.catch(() => {
        if (this.pending === attempt) this.pending = null;
      });
    }
    return this.pending;
  }

  async embedder(): Promise<BatchEmbedder> {
    return new BatchEmbedder(await this.resolve(), this.config);
  }

  /** Forces a re-probe on the next resolve(), optionally with new settings. */
  reset(config?: EmbeddingConfig): void {
    if (config) this.config = config;
    this.pending = null;
  }

  async status(): Promise<EmbeddingStatus> {
    try {
      const provider = await this.resolve();
      return { available: true, ...provider.identity() };
    } catch (err) {
      if (err instanceof ProviderUnavailableError) {
        return { available: false, attempted: err.attempted, message: err.message };
      }
      throw err;
    }
  }

  private async select(): Promise<EmbeddingProvider> {
    const explicit = this.config.provider;
    if (explicit !== 'auto') {
      const provider = this.factory(explicit, this.config, this.env);
      // the override skips the reachability probe; API providers still need a key
      if (explicit !== 'ollama' && !(await provider.isAvailable())) {
        logger.error(`Embedding provider '${explicit}' requires ${CREDENTIAL_HINT[explicit]}`);
        throw new ProviderUnavailableError([explicit]);
      }
      this.announce(provider);
      return provider;
    }

    const attempted: string[] = [];
    for (const name of PROVIDER_PRIORITY) {
      attempted.push(name);
      const provider = this.factory(name, this.config, this.env);
      if (await provider.isAvailable()) {
        this.announce(provider);
        return provider;
      }
      logger.debug(`Embedding provider '${name}' unavailable (needs ${CREDENTIAL_HINT[name]})`);
    }
    throw new ProviderUnavailableError(attempted);
  }

  private announce(provider: EmbeddingProvider): void {
    const { provider: name, model, dimensions } = provider.identity();
    logger.info(`Embedding provider: ${name}/${model} (${dimensions}d)`);
  }
}
