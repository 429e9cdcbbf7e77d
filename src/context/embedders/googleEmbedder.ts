import { z } from 'zod';
import type { EmbeddingProvider } from './embeddingProvider.js';
import type { EmbeddingIdentity } from '../../types/context.types.js';
import { postJson, sanitizeTexts, toVectors } from './embeddingProvider.js';

const batchEmbedResponse = z.object({
  embeddings: z.array(z.object({ values: z.array(z.number()) })),
});

/** Google Generative Language `batchEmbedContents`. */
export class GoogleEmbedder implements EmbeddingProvider {
  readonly name = 'google' as const;
  readonly maxBatchSize = 100;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly model = 'text-embedding-004',
    private readonly dimensions = 768,
  ) {}

  identity(): EmbeddingIdentity {
    return { provider: this.name, model: this.model, dimensions: this.dimensions };
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const url =
      `https://generativelanguage.googleapis.com/v1beta/models/${encodeURIComponent(this.model)}` +
      `:batchEmbedContents?key=${encodeURIComponent(this.apiKey ?? '')}`;
    const data = await postJson({
      label: 'Google',
      url,
      body: {
        requests: sanitizeTexts(texts).map((text) => ({
          model: `models/${this.model}`,
          content: { parts: [{ text }] },
        })),
      },
      schema: batchEmbedResponse,
      ...(signal !== undefined && { signal }),
    });
    return toVectors(data.embeddings.map((e) => e.values));
  }

  isAvailable(): Promise<boolean> {
    return Promise.resolve(Boolean(this.apiKey));
  }
}
