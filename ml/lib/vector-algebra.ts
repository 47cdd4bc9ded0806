import { DimensionMismatchError, EmptyInputError } from './errors';

export type Vector = readonly number[];

function assertSameDimension(a: Vector, b: Vector): void {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
}

export function zeroVector(dimension: number): number[] {
  return new Array<number>(dimension).fill(0);
}

export function add(a: Vector, b: Vector): number[] {
  assertSameDimension(a, b);
  return a.map((v, i) => v + b[i]);
}

export function subtract(a: Vector, b: Vector): number[] {
  assertSameDimension(a, b);
  return a.map((v, i) => v - b[i]);
}

export function scale(vector: Vector, factor: number): number[] {
  return vector.map(v => v * factor);
}

export function dot(a: Vector, b: Vector): number {
  assertSameDimension(a, b);
  return a.reduce((acc, v, i) => acc + v * b[i], 0);
}

export function norm(vector: Vector): number {
  return Math.sqrt(vector.reduce((square, v) => square + v * v, 0));
}

export function sum(vectors: readonly Vector[]): number[] {
  if (vectors.length === 0) {
    throw new EmptyInputError('the sum');
  }
  return vectors.slice(1).reduce<number[]>((acc, vector) => add(acc, vector), [...vectors[0]]);
}

export function average(vectors: readonly Vector[]): number[] {
  if (vectors.length === 0) {
    throw new EmptyInputError('the average');
  }
  return scale(sum(vectors), 1 / vectors.length);
}

/**
 * Cosine of the angle between two vectors.
 * Defined as 0 when either vector has zero length, so that a zero query never produces NaN.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  const product = dot(a, b);
  const norms = norm(a) * norm(b);
  return norms === 0 ? 0 : product / norms;
}

export function euclideanDistance(a: Vector, b: Vector): number {
  assertSameDimension(a, b);
  return Math.sqrt(a.reduce((square, v, i) => square + Math.pow(v - b[i], 2), 0));
}
