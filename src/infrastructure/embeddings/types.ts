/** Text → fixed-dimension vector. One vector per input, in input order. */
export interface EmbeddingsBackend {
  readonly model: string;
  embedDocuments(texts: string[]): Promise<number[][]>;
}
