import { z } from 'zod';
import type { EmbeddingProvider } from './embeddingProvider.js';
import type { EmbeddingIdentity } from '../../types/context.types.js';
import type { ProviderName } from '../../types/config.types.js';
import { postJson, sanitizeTexts, toVectors } from './embeddingProvider.js';

const embeddingsResponse = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().optional() })),
});

/**
 * OpenAI-style `/v1/embeddings` endpoint with bearer auth. Voyage speaks the
 * same protocol and reuses this class.
 */
export class OpenAICompatibleEmbedder implements EmbeddingProvider {
  constructor(
    readonly name: ProviderName,
    private readonly label: string,
    private readonly url: string,
    private readonly apiKey: string | undefined,
    private readonly model: string,
    private readonly dimensions: number,
    readonly maxBatchSize: number,
  ) {}

  identity(): EmbeddingIdentity {
    return { provider: this.name, model: this.model, dimensions: this.dimensions };
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const data = await postJson({
      label: this.label,
      url: this.url,
      headers: { Authorization: `Bearer ${this.apiKey ?? ''}` },
      body: { model: this.model, input: sanitizeTexts(texts) },
      schema: embeddingsResponse,
      ...(signal !== undefined && { signal }),
    });
    const rows = [...data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return toVectors(rows.map((r) => r.embedding));
  }

  isAvailable(): Promise<boolean> {
    return Promise.resolve(Boolean(this.apiKey));
  }
}

export function createOpenAIEmbedder(apiKey: string | undefined, model: string, dimensions: number): OpenAICompatibleEmbedder {
  return new OpenAICompatibleEmbedder(
    'openai',
    'OpenAI',
    'https://api.openai.com/v1/embeddings',
    apiKey,
    model,
    dimensions,
    256,
  );
}

export function createVoyageEmbedder(apiKey: string | undefined, model: string, dimensions: number): OpenAICompatibleEmbedder {
  return new OpenAICompatibleEmbedder(
    'voyage',
    'Voyage',
    'https://api.voyageai.com/v1/embeddings',
    apiKey,
    model,
    dimensions,
    128,
  );
}
