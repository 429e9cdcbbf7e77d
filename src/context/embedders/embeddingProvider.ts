import type { ZodType } from 'zod';
import type { ProviderName } from '../../types/config.types.js';
import type { EmbeddingIdentity } from '../../types/context.types.js';
import { BackendError } from '../../errors/backend.js';

export const MAX_EMBED_CHARS = 6000;

export interface EmbeddingProvider {
  readonly name: ProviderName;
  /** Largest batch the backend accepts in one request. */
  readonly maxBatchSize: number;
  identity(): EmbeddingIdentity;
  /** One vector per input, in input order. */
  embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]>;
  isAvailable(): Promise<boolean>;
}

/** Some backends reject empty input; all of them have a context limit. */
export function sanitizeTexts(texts: string[]): string[] {
  return texts.map((t) => (t.trim() || ' ').slice(0, MAX_EMBED_CHARS));
}

export interface PostJsonOptions<T> {
  label: string;
  url: string;
  body: unknown;
  schema: ZodType<T>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/** POST a JSON body and validate the JSON reply. Every failure is a BackendError. */
export async function postJson<T>(options: PostJsonOptions<T>): Promise<T> {
  const { label, url, body, schema, headers, signal } = options;
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      ...(signal !== undefined && { signal }),
    });
  } catch (err) {
    throw new BackendError(`Failed to connect to ${label} for embeddings`, undefined, err);
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => '');
    throw new BackendError(
      `${label} embed request failed: ${response.status} ${response.statusText}${detail ? ` - ${detail.slice(0, 200)}` : ''}`,
      response.status,
    );
  }

  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new BackendError(`${label} returned an unexpected embeddings payload`, response.status, parsed.error);
  }
  return parsed.data;
}

export function toVectors(rows: number[][]): Float32Array[] {
  return rows.map((row) => Float32Array.from(row));
}
