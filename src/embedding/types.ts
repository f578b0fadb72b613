/** Turns text into fixed-size vectors. Failures surface as `EncodingFailedError`. */
export interface Embedder {
  readonly name: string;
  readonly dimensions: number;
  encode(text: string, signal?: AbortSignal): Promise<number[]>;
  encodeBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}
