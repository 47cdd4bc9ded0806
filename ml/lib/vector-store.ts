import fs from 'fs';
import { IOError, ParseError } from './errors';
import { Vector } from './vector-algebra';

export interface EmbeddingTable {
  /**
   * Number of components of every vector, `undefined` only for an empty table loaded without an expected dimension.
   */
  readonly dimension: number | undefined;
  readonly vectors: ReadonlyMap<string, Vector>;
}

export interface LoadOptions {
  expectedDimension?: number;
  /**
   * Skip malformed rows with a warning instead of failing the whole load.
   */
  lenient?: boolean;
  onWarning?: (message: string) => void;
}

export function warnToConsole(message: string): void {
  console.error(`Warning: ${message}`);
}

const decimalRegExp = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
function parseComponent(field: string): number | undefined {
  if (!decimalRegExp.test(field)) {
    return undefined;
  }
  const value = Number(field);
  return isFinite(value) ? value : undefined;
}

class TableBuilder {
  private dimension: number | undefined;
  private vectors = new Map<string, Vector>();
  private onWarning: (message: string) => void;

  constructor(private options: LoadOptions) {
    this.dimension = options.expectedDimension;
    this.onWarning = options.onWarning || warnToConsole;
  }

  addLine(line: string, lineNumber: number): void {
    const [word, ...fields] = line.trim().split(/\s+/);
    if (!word) {
      return;
    }
    const parsed = this.parseFields(fields);
    if (typeof parsed === 'string') {
      if (!this.options.lenient) {
        throw new ParseError(lineNumber, parsed);
      }
      this.onWarning(`skipping line ${lineNumber} (${parsed})`);
      return;
    }
    this.dimension = parsed.length;
    // Map#set keeps the position of the first occurrence, only the vector is replaced
    this.vectors.set(word, Object.freeze(parsed));
  }

  build(): EmbeddingTable {
    return Object.freeze({ dimension: this.dimension, vectors: this.vectors });
  }

  /**
   * Returns the parsed vector, or the reason why the fields cannot form one.
   */
  private parseFields(fields: string[]): number[] | string {
    if (fields.length === 0) {
      return 'no vector components';
    }
    const vector: number[] = [];
    for (const field of fields) {
      const value = parseComponent(field);
      if (typeof value === 'undefined') {
        return `"${field}" is not a number`;
      }
      vector.push(value);
    }
    if (typeof this.dimension === 'number' && vector.length !== this.dimension) {
      return `expected ${this.dimension} components but found ${vector.length}`;
    }
    return vector;
  }
}

export function parseTable(text: string, options: LoadOptions = {}): EmbeddingTable {
  const builder = new TableBuilder(options);
  text.split(/\r?\n/).forEach((line, i) => builder.addLine(line, i + 1));
  return builder.build();
}

/**
 * Reads the whole file and parses it with the same line splitting as `parseTable`.
 */
export async function loadTable(path: string, options: LoadOptions = {}): Promise<EmbeddingTable> {
  const text = await new Promise<string>((resolve, reject) =>
    fs.readFile(path, 'utf8', (err, data) => err ? reject(new IOError(path, err)) : resolve(data))
  );
  return parseTable(text, options);
}

export function lookup(table: EmbeddingTable, word: string): Vector | undefined {
  return table.vectors.get(word);
}
