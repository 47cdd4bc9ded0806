import { add, average, subtract, sum, Vector, zeroVector } from './vector-algebra';
import { EmbeddingTable, lookup, warnToConsole } from './vector-store';

export const combinationModes = ['expression', 'sum', 'average'] as const;
export type CombinationMode = (typeof combinationModes)[number];

export interface Combination {
  /**
   * `undefined` when none of the input words is in the vocabulary.
   */
  vector: number[] | undefined;
  /**
   * Distinct input words found in the vocabulary, in input order.
   */
  words: string[];
  unknownWords: string[];
}

type Operator = '+' | '-';

function isOperator(token: string): token is Operator {
  return token === '+' || token === '-';
}

function unknownWordMessage(word: string): string {
  return `'${word}' is not in the vocabulary, skipping`;
}

function pushUnique(words: string[], word: string): void {
  if (words.indexOf(word) < 0) {
    words.push(word);
  }
}

/**
 * Evaluates word analogy arithmetic such as `king - man + woman`.
 * An operator only sets the sign applied to the following words; the first word is added.
 */
export function evaluateExpression(tokens: string[], table: EmbeddingTable, onWarning: (message: string) => void = warnToConsole): Combination {
  let sign: Operator = '+';
  const words: string[] = [];
  const unknownWords: string[] = [];
  const vector = tokens.reduce<number[]>((acc, token) => {
    if (isOperator(token)) {
      sign = token;
      return acc;
    }
    const wordVector = lookup(table, token);
    if (!wordVector) {
      onWarning(unknownWordMessage(token));
      pushUnique(unknownWords, token);
      return acc;
    }
    pushUnique(words, token);
    return sign === '+' ? add(acc, wordVector) : subtract(acc, wordVector);
  }, zeroVector(table.dimension || 0));
  return { vector: words.length > 0 ? vector : undefined, words, unknownWords };
}

function aggregateWords(tokens: string[], table: EmbeddingTable, aggregate: (vectors: Vector[]) => number[], onWarning: (message: string) => void): Combination {
  const words: string[] = [];
  const unknownWords: string[] = [];
  const vectors = tokens.reduce<Vector[]>((acc, token) => {
    if (isOperator(token)) {
      onWarning(`operator '${token}' has no effect when combining words by sum or average, ignoring`);
      return acc;
    }
    const wordVector = lookup(table, token);
    if (wordVector) {
      acc.push(wordVector);
      pushUnique(words, token);
    } else {
      onWarning(unknownWordMessage(token));
      pushUnique(unknownWords, token);
    }
    return acc;
  }, []);
  return { vector: vectors.length > 0 ? aggregate(vectors) : undefined, words, unknownWords };
}

export function combineWords(tokens: string[], table: EmbeddingTable, mode: CombinationMode, onWarning: (message: string) => void = warnToConsole): Combination {
  switch (mode) {
    case 'expression':
      return evaluateExpression(tokens, table, onWarning);
    case 'sum':
      return aggregateWords(tokens, table, sum, onWarning);
    case 'average':
      return aggregateWords(tokens, table, average, onWarning);
  }
}
