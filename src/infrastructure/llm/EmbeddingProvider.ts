/**
 * Embedding deployment on the Azure OpenAI resource, exposed as an
 * EmbeddingPort. One call per batch; no retries at this level (the
 * embedding batcher owns them).
 */
import type { EmbeddingPort } from "@domain/embedding/ports";
import type { AzureOpenAI } from "openai";

export class AzureOpenAIEmbeddingProvider implements EmbeddingPort {
  constructor(
    private readonly client: AzureOpenAI,
    readonly model: string
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
    });

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
