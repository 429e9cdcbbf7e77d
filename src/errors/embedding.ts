import { AtlasError } from './base.js';
import type { EmbeddingIdentity } from '../types/context.types.js';

export function formatIdentity(identity: EmbeddingIdentity): string {
  return `${identity.provider}/${identity.model} (${identity.dimensions}d)`;
}

export class ProviderUnavailableError extends AtlasError {
  constructor(public readonly attempted: string[]) {
    super(
      attempted.length > 0
        ? `No embedding provider available (tried: ${attempted.join(', ')}). ` +
            'Start Ollama, or set GOOGLE_API_KEY, OPENAI_API_KEY or VOYAGE_API_KEY.'
        : 'No embedding provider available.',
      'PROVIDER_UNAVAILABLE',
    );
  }
}

export class EmbeddingCompatibilityError extends AtlasError {
  constructor(
    public readonly stored: EmbeddingIdentity,
    public readonly active: EmbeddingIdentity,
    projectRoot: string,
  ) {
    super(
      `Embedding provider mismatch for ${projectRoot}: indexed with ${formatIdentity(stored)}, ` +
        `active provider is ${formatIdentity(active)}. Re-index from scratch to switch providers ` +
        `(code-atlas index --reset ${projectRoot}).`,
      'EMBEDDING_COMPATIBILITY_MISMATCH',
    );
  }
}

export class BatchEmbeddingError extends AtlasError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, 'BATCH_EMBEDDING_FAILURE', cause);
  }
}
