import { z } from 'zod';
import type { EmbeddingProvider } from './embeddingProvider.js';
import type { EmbeddingIdentity } from '../../types/context.types.js';
import { postJson, sanitizeTexts, toVectors } from './embeddingProvider.js';
import { BackendError } from '../../errors/backend.js';

const ollamaEmbedResponse = z.object({
  embeddings: z.array(z.array(z.number())),
});

/** Local Ollama server, `POST /api/embed` with an array input. */
export class OllamaEmbedder implements EmbeddingProvider {
  readonly name = 'ollama' as const;
  readonly maxBatchSize = 32;

  constructor(
    private readonly baseUrl: string,
    private readonly model = 'nomic-embed-text',
    private readonly dimensions = 768,
  ) {}

  identity(): EmbeddingIdentity {
    return { provider: this.name, model: this.model, dimensions: this.dimensions };
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const data = await postJson({
      label: 'Ollama',
      url: `${this.baseUrl}/api/embed`,
      body: { model: this.model, input: sanitizeTexts(texts) },
      schema: ollamaEmbedResponse,
      ...(signal !== undefined && { signal }),
    });
    if (data.embeddings.length === 0 && texts.length > 0) {
      throw new BackendError(
        `Ollama returned empty embeddings for model '${this.model}'. Ensure the model is pulled: ollama pull ${this.model}`,
      );
    }
    return toVectors(data.embeddings);
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, { signal: AbortSignal.timeout(2000) });
      return response.ok;
    } catch {
      return false;
    }
  }
}
