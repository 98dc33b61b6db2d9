/**
 * Domain port for text-to-vector providers.
 *
 * `embed` receives one batch and must resolve one vector per input, in
 * input order.
 */
export interface EmbeddingPort {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}
