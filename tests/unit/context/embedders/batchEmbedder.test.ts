import { describe, it, expect, vi } from 'vitest';
import { BatchEmbedder } from '../../../../src/context/embedders/batchEmbedder.js';
import { isTransientError } from '../../../../src/context/embedders/retry.js';
import type { EmbeddingProvider } from '../../../../src/context/embedders/embeddingProvider.js';
import { BackendError } from '../../../../src/errors/backend.js';
import { BatchEmbeddingError } from '../../../../src/errors/embedding.js';

function fakeProvider(embed: EmbeddingProvider['embed'], maxBatchSize = 2, dimensions = 2): EmbeddingProvider {
  return {
    name: 'ollama',
    maxBatchSize,
    identity: () => ({ provider: 'ollama', model: 'fake', dimensions }),
    embed,
    isAvailable: () => Promise.resolve(true),
  };
}

const vectorsFor = (texts: string[]): Float32Array[] => texts.map((_, i) => Float32Array.from([i, 1]));

const OPTIONS = { timeoutMs: 1000, maxAttempts: 3, retryBaseDelayMs: 0 };

describe('BatchEmbedder', () => {
  it('splits input into provider-sized batches', async () => {
    const embed = vi.fn((texts: string[]) => Promise.resolve(vectorsFor(texts)));
    const embedder = new BatchEmbedder(fakeProvider(embed), OPTIONS);

    const result = await embedder.embedAll(['a', 'b', 'c', 'd', 'e']);

    expect(result).toHaveLength(5);
    expect(embed.mock.calls.map((c) => c[0])).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });

  it('honours an explicit batch size', async () => {
    const embed = vi.fn((texts: string[]) => Promise.resolve(vectorsFor(texts)));
    const embedder = new BatchEmbedder(fakeProvider(embed), { ...OPTIONS, batchSize: 4 });

    await embedder.embedAll(['a', 'b', 'c', 'd', 'e']);

    expect(embed).toHaveBeenCalledTimes(2);
  });

  it('retries only the failing batch on a transient error', async () => {
    const embed = vi
      .fn((texts: string[]) => Promise.resolve(vectorsFor(texts)))
      .mockImplementationOnce((texts: string[]) => Promise.resolve(vectorsFor(texts)))
      .mockImplementationOnce(() => Promise.reject(new BackendError('busy', 503)));
    const embedder = new BatchEmbedder(fakeProvider(embed), OPTIONS);

    const result = await embedder.embedAll(['a', 'b', 'c']);

    expect(result).toHaveLength(3);
    expect(embed.mock.calls.map((c) => c[0])).toEqual([['a', 'b'], ['c'], ['c']]);
  });

  it('does not retry an authentication failure', async () => {
    const embed = vi.fn(() => Promise.reject(new BackendError('unauthorized', 401)));
    const embedder = new BatchEmbedder(fakeProvider(embed), OPTIONS);

    const err = await embedder.embedAll(['a']).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BatchEmbeddingError);
    expect(err).toMatchObject({ attempts: 1, code: 'BATCH_EMBEDDING_FAILURE' });
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxAttempts transient failures', async () => {
    const embed = vi.fn(() => Promise.reject(new BackendError('Failed to connect to Ollama for embeddings')));
    const embedder = new BatchEmbedder(fakeProvider(embed), OPTIONS);

    const err = await embedder.embedAll(['a']).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BatchEmbeddingError);
    expect(err).toMatchObject({
      attempts: 3,
      message: 'Embedding batch failed after 3 attempt(s): Failed to connect to Ollama for embeddings',
    });
    expect(embed).toHaveBeenCalledTimes(3);
  });

  it('rejects vectors of the wrong dimension without retrying', async () => {
    const embed = vi.fn((texts: string[]) => Promise.resolve(texts.map(() => Float32Array.from([1, 2, 3]))));
    const embedder = new BatchEmbedder(fakeProvider(embed), OPTIONS);

    await expect(embedder.embedAll(['a'])).rejects.toThrow('returned a 3-dimensional vector, expected 2');
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it('aborts an attempt that exceeds the timeout', async () => {
    let aborted = false;
    const embed = vi.fn(
      (_texts: string[], signal?: AbortSignal) =>
        new Promise<Float32Array[]>(() => {
          signal?.addEventListener('abort', () => {
            aborted = true;
          });
        }),
    );
    const embedder = new BatchEmbedder(fakeProvider(embed), { ...OPTIONS, timeoutMs: 10, maxAttempts: 1 });

    await expect(embedder.embedAll(['a'])).rejects.toThrow('Embedding request timed out after 10 ms');
    expect(aborted).toBe(true);
  });
});

describe('isTransientError', () => {
  it('classifies backend failures by status', () => {
    expect(isTransientError(new BackendError('down'))).toBe(true);
    expect(isTransientError(new BackendError('rate', 429))).toBe(true);
    expect(isTransientError(new BackendError('gateway', 502))).toBe(true);
    expect(isTransientError(new BackendError('bad', 400))).toBe(false);
    expect(isTransientError(new Error('plain'))).toBe(false);
  });
});
