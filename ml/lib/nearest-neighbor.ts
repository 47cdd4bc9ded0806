import { cosineSimilarity, euclideanDistance, Vector } from './vector-algebra';
import { EmbeddingTable, lookup } from './vector-store';

export const metricNames = ['cosine', 'euclidean'] as const;
export type MetricName = (typeof metricNames)[number];

export interface Metric {
  name: MetricName;
  /**
   * Printed next to the score, e.g. "cosine similarity: 0.7071".
   */
  label: string;
  direction: 'maximize' | 'minimize';
  score(a: Vector, b: Vector): number;
}

export const metrics: { [name in MetricName]: Metric } = {
  cosine: { name: 'cosine', label: 'cosine similarity', direction: 'maximize', score: cosineSimilarity },
  euclidean: { name: 'euclidean', label: 'euclidean distance', direction: 'minimize', score: euclideanDistance },
};

export interface Neighbor {
  word: string;
  score: number;
}

export interface SearchOptions {
  metric?: Metric;
  exclude?: Iterable<string>;
}

function isBetter(metric: Metric, score: number, than: number): boolean {
  return metric.direction === 'maximize' ? score > than : score < than;
}

/**
 * Scans the whole table and returns the entry closest to `target`, or `undefined` when every entry is excluded.
 * On equal scores the entry met first in the table's iteration order is kept.
 */
export function findNearestNeighbor(target: Vector, table: EmbeddingTable, { metric = metrics.cosine, exclude = [] }: SearchOptions = {}): Neighbor | undefined {
  const excluded = new Set(exclude);
  let best: Neighbor | undefined;
  for (const [word, vector] of table.vectors) {
    if (excluded.has(word)) {
      continue;
    }
    const score = metric.score(target, vector);
    if (!best || isBetter(metric, score, best.score)) {
      best = { word, score };
    }
  }
  return best;
}

export function findNearestNeighbors(target: Vector, table: EmbeddingTable, { metric = metrics.cosine, exclude = [], count }: SearchOptions & { count: number }): Neighbor[] {
  const excluded = new Set(exclude);
  const ranked: Neighbor[] = [];
  for (const [word, vector] of table.vectors) {
    if (excluded.has(word)) {
      continue;
    }
    const neighbor = { word, score: metric.score(target, vector) };
    // insert after every entry that is at least as good, so that ties stay in iteration order
    const index = ranked.findIndex(({ score }) => isBetter(metric, neighbor.score, score));
    if (index < 0) {
      if (ranked.length < count) {
        ranked.push(neighbor);
      }
    } else {
      ranked.splice(index, 0, neighbor);
      if (ranked.length > count) {
        ranked.pop();
      }
    }
  }
  return ranked;
}

export function mostSimilarWords(table: EmbeddingTable, word: string, count: number, metric: Metric = metrics.cosine): Neighbor[] | undefined {
  const vector = lookup(table, word);
  return vector && findNearestNeighbors(vector, table, { metric, exclude: [word], count });
}
