import { createHash } from 'node:crypto';
import { basename, resolve } from 'node:path';

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/** 16 hex chars of sha256. Used for both file and chunk content. */
export function contentHash(text: string): string {
  return sha256(text).slice(0, 16);
}

/** Deterministic: identical path, span and bytes always give the same id. */
export function chunkId(filePath: string, startLine: number, endLine: number, hash: string): string {
  return sha256(`${filePath}:${startLine}:${endLine}:${hash}`).slice(0, 32);
}

/** `<basename>_<sha256(root)[0..12]>`, stable for a given absolute root. */
export function projectIdFor(projectRoot: string): string {
  const root = resolve(projectRoot);
  const name = basename(root).replace(/[^A-Za-z0-9._-]/g, '_') || 'root';
  return `${name}_${sha256(root).slice(0, 12)}`;
}

export function collectionName(projectId: string, generation: number): string {
  return `${projectId}__g${generation}`;
}
