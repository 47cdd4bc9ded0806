import { analyze, formatNeighbor, formatOutcome, NO_RESULT_MESSAGE, NO_VALID_WORDS_MESSAGE } from './analogy';
import { metrics } from './nearest-neighbor';
import { parseTable } from './vector-store';

const table = parseTable([
  'a 1 0',
  'b 0 1',
  'c 1 1',
  'd -1 0',
].join('\n'));

const ignoreWarnings = () => undefined;

describe('analyze', () => {
  it('should report the nearest word that is not an input word', () => {
    const outcome = analyze(table, { tokens: ['a', 'b'], mode: 'average', metric: 'cosine', top: 1 }, ignoreWarnings);
    expect(formatOutcome(outcome)).toEqual(['c cosine similarity: 1.0000']);
  });

  it('should report several neighbors best first', () => {
    const outcome = analyze(table, { tokens: ['a'], mode: 'sum', metric: 'euclidean', top: 2 }, ignoreWarnings);
    expect(formatOutcome(outcome)).toEqual(['c euclidean distance: 1.0000', 'b euclidean distance: 1.4142']);
  });

  it('should report that no input word is known', () => {
    const outcome = analyze(table, { tokens: ['x', '+', 'y'], mode: 'expression', metric: 'cosine', top: 1 }, ignoreWarnings);
    expect(outcome.kind).toBe('no-valid-words');
    expect(formatOutcome(outcome)).toEqual([NO_VALID_WORDS_MESSAGE]);
  });

  it('should report that every word was excluded', () => {
    const outcome = analyze(table, { tokens: ['a', 'b', 'c', 'd'], mode: 'sum', metric: 'cosine', top: 3 }, ignoreWarnings);
    expect(outcome.kind).toBe('no-result');
    expect(formatOutcome(outcome)).toEqual([NO_RESULT_MESSAGE]);
  });

  it('should pass warnings to the callback', () => {
    const warnings: string[] = [];
    analyze(table, { tokens: ['a', 'zzz'], mode: 'expression', metric: 'cosine', top: 1 }, message => warnings.push(message));
    expect(warnings).toEqual(["'zzz' is not in the vocabulary, skipping"]);
  });
});

describe('formatNeighbor', () => {
  it('should print the score with four decimals', () => {
    expect(formatNeighbor({ word: 'queen', score: 0.123456 }, metrics.cosine)).toBe('queen cosine similarity: 0.1235');
    expect(formatNeighbor({ word: 'x', score: 2 }, metrics.euclidean)).toBe('x euclidean distance: 2.0000');
  });
});
