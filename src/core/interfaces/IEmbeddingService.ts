/**
 * IEmbeddingService - Text to vector
 *
 * @module
 */

export interface IEmbeddingService {
  readonly modelId: string;
  readonly dimensions: number;

  embed(text: string): Promise<number[]>;

  /**
   * Embeds texts in one request; output order matches input order.
   */
  embedBatch(texts: readonly string[]): Promise<number[][]>;
}
