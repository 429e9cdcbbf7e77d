import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { ProjectManifest } from '../types/context.types.js';
import { ManifestCorruptError } from '../errors/context.js';
import { logger } from '../logging/logger.js';

const manifestSchema: z.ZodType<ProjectManifest> = z.object({
  version: z.literal(1),
  projectId: z.string(),
  root: z.string(),
  collection: z.string(),
  generation: z.number().int().nonnegative(),
  embedding: z.object({ provider: z.string(), model: z.string(), dimensions: z.number().int().positive() }),
  files: z.record(
    z.object({
      contentHash: z.string(),
      chunks: z.array(z.object({ id: z.string(), contentHash: z.string() })),
      indexedAt: z.string(),
    }),
  ),
  orphanedChunkIds: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** One JSON file per project under `<dataDir>/manifests`. */
export class ManifestStore {
  private readonly dir: string;

  constructor(dataDir: string) {
    this.dir = join(dataDir, 'manifests');
  }

  pathFor(projectId: string): string {
    return join(this.dir, `${projectId}.json`);
  }

  async load(projectId: string): Promise<ProjectManifest | null> {
    const path = this.pathFor(projectId);
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ManifestCorruptError(path, err);
    }
    const parsed = manifestSchema.safeParse(json);
    if (!parsed.success) throw new ManifestCorruptError(path, parsed.error);
    return parsed.data;
  }

  /** Write-temp-then-rename, so readers see the old manifest or the new one. */
  async save(manifest: ProjectManifest): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const path = this.pathFor(manifest.projectId);
    const tempPath = `${path}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(manifest, null, 2), 'utf8');
    await rename(tempPath, path);
  }

  async delete(projectId: string): Promise<void> {
    await rm(this.pathFor(projectId), { force: true });
  }

  /** Every readable manifest, sorted by project root. Corrupt files are logged and skipped. */
  async list(): Promise<ProjectManifest[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    const manifests: ProjectManifest[] = [];
    for (const name of names.filter((n) => n.endsWith('.json')).sort()) {
      let manifest: ProjectManifest | null;
      try {
        manifest = await this.load(name.slice(0, -'.json'.length));
      } catch (err) {
        if (!(err instanceof ManifestCorruptError)) throw err;
        logger.warn(err.message);
        continue;
      }
      if (manifest) manifests.push(manifest);
    }
    return manifests.sort((a, b) => (a.root < b.root ? -1 : a.root > b.root ? 1 : 0));
  }
}
