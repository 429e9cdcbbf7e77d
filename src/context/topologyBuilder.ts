import { resolve } from 'node:path';
import type { TopologyConfig } from '../types/config.types.js';
import type { TopologyComponent, TopologyEdge, TopologyGraph } from '../types/context.types.js';
import type { StoredVector, VectorStore } from './vectorStore.js';
import type { ManifestStore } from './manifestStore.js';
import { projectIdFor } from './hashing.js';
import { addInto, dot, normalize, norm } from './vectorMath.js';
import { NotIndexedError } from '../errors/context.js';

export interface TopologyBuilderOptions {
  store: VectorStore;
  manifests: ManifestStore;
  config: TopologyConfig;
}

interface Member {
  entry: StoredVector;
  unit: Float32Array;
}

interface Cluster {
  members: Member[];
  /** Sum of the members' unit vectors. */
  sum: Float32Array;
}

class UnionFind {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(x: number): number {
    let node = x;
    while (this.parent[node] !== node) {
      const grand = this.parent[this.parent[node] ?? node] ?? node;
      this.parent[node] = grand;
      node = grand;
    }
    return node;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    // the smaller index stays root so cluster order follows visit order
    if (ra < rb) this.parent[rb] = ra;
    else if (rb < ra) this.parent[ra] = rb;
  }
}

function byLocation(a: StoredVector, b: StoredVector): number {
  const fa = a.metadata.filePath;
  const fb = b.metadata.filePath;
  if (fa !== fb) return fa < fb ? -1 : 1;
  if (a.metadata.startLine !== b.metadata.startLine) return a.metadata.startLine - b.metadata.startLine;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/** Directory prefixes of a file, shallowest first, always starting with the root `.`. */
function directoryPrefixes(filePath: string): string[] {
  const dirs = filePath.split('/').slice(0, -1);
  const prefixes = ['.'];
  for (let i = 1; i <= dirs.length; i++) prefixes.push(dirs.slice(0, i).join('/'));
  return prefixes;
}

/** The prefix shared by the most members; ties go to the deeper, then the lexically smaller one. */
export function componentName(filePaths: string[]): string {
  const counts = new Map<string, number>();
  for (const path of filePaths) {
    for (const prefix of directoryPrefixes(path)) counts.set(prefix, (counts.get(prefix) ?? 0) + 1);
  }
  let best = '.';
  let bestCount = 0;
  let bestDepth = 0;
  for (const [prefix, count] of counts) {
    const depth = prefix === '.' ? 0 : prefix.split('/').length;
    if (
      count > bestCount ||
      (count === bestCount && depth > bestDepth) ||
      (count === bestCount && depth === bestDepth && prefix < best)
    ) {
      best = prefix;
      bestCount = count;
      bestDepth = depth;
    }
  }
  return best;
}

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}

/**
 * Groups a project's chunks into components: connected components of the
 * graph whose edges join chunks at or above `clusterThreshold` cosine
 * similarity. Recomputed on every call.
 */
export class TopologyBuilder {
  constructor(private readonly options: TopologyBuilderOptions) {}

  async build(projectRoot: string): Promise<TopologyGraph> {
    const root = resolve(projectRoot);
    const manifest = await this.options.manifests.load(projectIdFor(root));
    if (!manifest) throw new NotIndexedError(root);

    const entries = (await this.options.store.get(manifest.collection)).sort(byLocation);
    const members: Member[] = entries.map((entry) => ({ entry, unit: normalize(entry.vector) }));
    const clusters = this.cluster(members);

    const names = new Map<string, number>();
    const components = clusters.map((cluster) => {
      const base = componentName(cluster.members.map((m) => m.entry.metadata.filePath));
      const seen = (names.get(base) ?? 0) + 1;
      names.set(base, seen);
      return this.describe(cluster, seen === 1 ? base : `${base}#${seen}`);
    });

    return { projectRoot: manifest.root, components, edges: this.edges(clusters, components) };
  }

  private cluster(members: Member[]): Cluster[] {
    if (members.length === 0) return [{ members: [], sum: new Float32Array(0) }];

    const { clusterThreshold } = this.options.config;
    const sets = new UnionFind(members.length);
    for (let i = 0; i < members.length; i++) {
      for (let j = i + 1; j < members.length; j++) {
        const a = members[i];
        const b = members[j];
        if (a && b && dot(a.unit, b.unit) >= clusterThreshold) sets.union(i, j);
      }
    }

    const byRoot = new Map<number, Cluster>();
    members.forEach((member, i) => {
      const rootIndex = sets.find(i);
      let cluster = byRoot.get(rootIndex);
      if (!cluster) {
        cluster = { members: [], sum: new Float32Array(member.unit.length) };
        byRoot.set(rootIndex, cluster);
      }
      cluster.members.push(member);
      addInto(cluster.sum, member.unit);
    });
    return [...byRoot.values()];
  }

  private describe(cluster: Cluster, name: string): TopologyComponent {
    const centroidNorm = norm(cluster.sum);
    const closeness = (m: Member): number => (centroidNorm === 0 ? 0 : dot(m.unit, cluster.sum) / centroidNorm);
    const representatives = [...cluster.members]
      .sort((a, b) => closeness(b) - closeness(a) || byLocation(a.entry, b.entry))
      .slice(0, this.options.config.representatives)
      .map(({ entry }) => ({
        chunkId: entry.id,
        filePath: entry.metadata.filePath,
        startLine: entry.metadata.startLine,
        endLine: entry.metadata.endLine,
        kind: entry.metadata.kind,
        symbolName: entry.metadata.symbolName,
      }));

    return {
      name,
      chunkIds: cluster.members.map((m) => m.entry.id),
      chunkCount: cluster.members.length,
      files: uniqueSorted(cluster.members.map((m) => m.entry.metadata.filePath)),
      languages: uniqueSorted(cluster.members.map((m) => m.entry.metadata.language)),
      representatives,
    };
  }

  /** Mean cross-cluster cosine similarity equals sumA · sumB / (|A| |B|) over unit vectors. */
  private edges(clusters: Cluster[], components: TopologyComponent[]): TopologyEdge[] {
    const edges: TopologyEdge[] = [];
    for (let i = 0; i < clusters.length; i++) {
      for (let j = i + 1; j < clusters.length; j++) {
        const a = clusters[i];
        const b = clusters[j];
        const from = components[i]?.name;
        const to = components[j]?.name;
        if (!a || !b || from === undefined || to === undefined) continue;
        const similarity = dot(a.sum, b.sum) / (a.members.length * b.members.length);
        if (similarity >= this.options.config.edgeThreshold) edges.push({ from, to, similarity });
      }
    }
    return edges.sort(
      (x, y) => y.similarity - x.similarity || x.from.localeCompare(y.from) || x.to.localeCompare(y.to),
    );
  }
}
