import { z } from 'zod';
import type { AppConfig } from '../types/config.types.js';
import { AtlasError } from '../errors/base.js';

export class ConfigValidationError extends AtlasError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
  }
}

const providerName = z.enum(['ollama', 'google', 'openai', 'voyage']);
const positiveInt = z.number().int().positive();
const similarity = z.number().min(-1).max(1);

const appConfigSchema = z.object({
  dataDir: z.string().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  embedding: z.object({
    provider: z.union([providerName, z.literal('auto')]),
    models: z.record(providerName, z.string().min(1)),
    dimensions: z.record(providerName, positiveInt),
    ollamaBaseUrl: z.string().url(),
    batchSize: positiveInt.optional(),
    timeoutMs: positiveInt,
    maxAttempts: positiveInt,
    retryBaseDelayMs: z.number().int().nonnegative(),
  }),
  chunking: z.object({
    windowLines: positiveInt,
    overlapLines: z.number().int().nonnegative(),
    maxDefinitionLines: positiveInt,
    maxChunkLines: positiveInt,
    statementGapLines: positiveInt,
  }),
  watch: z.object({
    debounceMs: z.number().int().nonnegative(),
  }),
  topology: z.object({
    clusterThreshold: similarity,
    edgeThreshold: similarity,
    representatives: positiveInt,
  }),
  store: z.enum(['sqlite', 'memory']),
});

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/** Validates a merged configuration object and returns it typed. */
export function validateConfig(raw: unknown): AppConfig {
  const parsed = appConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(
      `Invalid configuration: ${parsed.error.issues.map(formatIssue).join('; ')}`,
    );
  }
  const config = parsed.data;

  if (config.chunking.overlapLines >= config.chunking.windowLines) {
    throw new ConfigValidationError(
      `chunking.overlapLines (${config.chunking.overlapLines}) must be smaller than chunking.windowLines (${config.chunking.windowLines}).`,
    );
  }

  return config;
}
