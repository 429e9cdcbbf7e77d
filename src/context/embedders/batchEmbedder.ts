import type { EmbeddingProvider } from './embeddingProvider.js';
import type { EmbeddingConfig } from '../../types/config.types.js';
import type { EmbeddingIdentity } from '../../types/context.types.js';
import { AttemptsExhaustedError, isTransientError, retry } from './retry.js';
import { BackendError } from '../../errors/backend.js';
import { BatchEmbeddingError } from '../../errors/embedding.js';
import { logger } from '../../logging/logger.js';

export type BatchEmbedderOptions = Pick<EmbeddingConfig, 'batchSize' | 'timeoutMs' | 'maxAttempts' | 'retryBaseDelayMs'>;

/**
 * Splits texts into provider-sized batches and embeds them one batch at a
 * time. Each batch is retried on its own, so a retry never resends batches
 * that already succeeded.
 */
export class BatchEmbedder {
  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: BatchEmbedderOptions,
  ) {}

  identity(): EmbeddingIdentity {
    return this.provider.identity();
  }

  get batchSize(): number {
    return this.options.batchSize ?? this.provider.maxBatchSize;
  }

  async embedAll(texts: string[]): Promise<Float32Array[]> {
    const vectors: Float32Array[] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      vectors.push(...(await this.embedBatch(batch)));
    }
    return vectors;
  }

  private async embedBatch(batch: string[]): Promise<Float32Array[]> {
    const { dimensions, provider } = this.provider.identity();
    try {
      return await retry(
        async (signal) => {
          const vectors = await this.provider.embed(batch, signal);
          if (vectors.length !== batch.length) {
            throw new BackendError(`${provider} returned ${vectors.length} vectors for ${batch.length} inputs`);
          }
          const wrong = vectors.find((v) => v.length !== dimensions);
          if (wrong) {
            throw new BackendError(
              `${provider} returned a ${wrong.length}-dimensional vector, expected ${dimensions}. ` +
                `Set embedding.dimensions.${provider} to match the model.`,
              422,
            );
          }
          return vectors;
        },
        {
          maxAttempts: this.options.maxAttempts,
          baseDelayMs: this.options.retryBaseDelayMs,
          timeoutMs: this.options.timeoutMs,
          shouldRetry: isTransientError,
          onRetry: (error, attempt) =>
            logger.warn(
              `${provider} batch of ${batch.length} failed (attempt ${attempt}): ${error instanceof Error ? error.message : String(error)}`,
            ),
        },
      );
    } catch (err) {
      if (err instanceof AttemptsExhaustedError) {
        throw new BatchEmbeddingError(
          `Embedding batch failed after ${err.attempts} attempt(s): ${err.message}`,
          err.attempts,
          err.lastError,
        );
      }
      throw err;
    }
  }
}
