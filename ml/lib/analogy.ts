import { Combination, combineWords } from './expression';
import { findNearestNeighbor, findNearestNeighbors, Metric, metrics, Neighbor } from './nearest-neighbor';
import { AnalogyOptions } from './options';
import { isDefined } from './util';
import { EmbeddingTable, loadTable, warnToConsole } from './vector-store';

export const NO_VALID_WORDS_MESSAGE = 'No valid input words found in the vocabulary.';
export const NO_RESULT_MESSAGE = 'No nearest neighbor found.';

export type AnalogyOutcome =
  | { kind: 'neighbors'; combination: Combination; metric: Metric; neighbors: Neighbor[]; }
  | { kind: 'no-valid-words'; combination: Combination; }
  | { kind: 'no-result'; combination: Combination; };

type QueryOptions = Pick<AnalogyOptions, 'tokens' | 'mode' | 'metric' | 'top'>;

/**
 * Combines the input words and looks up the closest vocabulary words, never returning the input words themselves.
 */
export function analyze(table: EmbeddingTable, { tokens, mode, metric: metricName, top }: QueryOptions, onWarning: (message: string) => void = warnToConsole): AnalogyOutcome {
  const combination = combineWords(tokens, table, mode, onWarning);
  if (!combination.vector) {
    return { kind: 'no-valid-words', combination };
  }
  const metric = metrics[metricName];
  const searchOptions = { metric, exclude: combination.words };
  const neighbors = top === 1
    ? [findNearestNeighbor(combination.vector, table, searchOptions)].filter(isDefined)
    : findNearestNeighbors(combination.vector, table, { ...searchOptions, count: top });
  return neighbors.length > 0
    ? { kind: 'neighbors', combination, metric, neighbors }
    : { kind: 'no-result', combination };
}

export async function runAnalogy(options: AnalogyOptions, onWarning: (message: string) => void = warnToConsole): Promise<AnalogyOutcome> {
  const table = await loadTable(options.tablePath, { expectedDimension: options.dimension, lenient: options.lenient, onWarning });
  return analyze(table, options, onWarning);
}

export function formatNeighbor({ word, score }: Neighbor, metric: Metric): string {
  return `${word} ${metric.label}: ${score.toFixed(4)}`;
}

export function formatOutcome(outcome: AnalogyOutcome): string[] {
  switch (outcome.kind) {
    case 'neighbors':
      return outcome.neighbors.map(neighbor => formatNeighbor(neighbor, outcome.metric));
    case 'no-valid-words':
      return [NO_VALID_WORDS_MESSAGE];
    case 'no-result':
      return [NO_RESULT_MESSAGE];
  }
}
