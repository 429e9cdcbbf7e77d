import type { EmbeddingProvider } from '../../src/context/embedders/embeddingProvider.js';
import type { ProviderName } from '../../src/types/config.types.js';
import type { EmbeddingIdentity } from '../../src/types/context.types.js';

export const DEFAULT_VOCABULARY = ['f', 'g', 'h', 'parse', 'render', 'user', 'order', 'token'];

/**
 * Deterministic in-process embedder: one dimension per vocabulary word
 * counting its occurrences, plus a constant dimension so no vector is zero.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly maxBatchSize = 16;
  /** Every batch passed to embed(), in call order. */
  readonly batches: string[][] = [];
  available = true;
  failNext = 0;

  constructor(
    readonly name: ProviderName = 'ollama',
    private readonly vocabulary: string[] = DEFAULT_VOCABULARY,
    private readonly model = 'keyword-test',
  ) {}

  identity(): EmbeddingIdentity {
    return { provider: this.name, model: this.model, dimensions: this.vocabulary.length + 1 };
  }

  get embeddedCount(): number {
    return this.batches.reduce((sum, b) => sum + b.length, 0);
  }

  embed(texts: string[]): Promise<Float32Array[]> {
    if (this.failNext > 0) {
      this.failNext--;
      return Promise.reject(new Error('keyword embedder failure'));
    }
    this.batches.push([...texts]);
    return Promise.resolve(texts.map((t) => this.vectorFor(t)));
  }

  vectorFor(text: string): Float32Array {
    const vector = new Float32Array(this.vocabulary.length + 1);
    for (const token of text.toLowerCase().match(/[a-z0-9_]+/g) ?? []) {
      const index = this.vocabulary.indexOf(token);
      if (index >= 0) vector[index] = (vector[index] ?? 0) + 1;
    }
    vector[this.vocabulary.length] = 0.01;
    return vector;
  }

  isAvailable(): Promise<boolean> {
    return Promise.resolve(this.available);
  }
}
