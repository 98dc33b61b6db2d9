/**
 * Composition root: turns an AppConfig into the concrete adapters behind
 * each domain port. Built once at startup and handed to the HTTP layer or
 * the walkthrough script.
 */
import type { AppConfig } from "@config/index";
import type { DatasetRow } from "@domain/dataset/types";
import type { EmbeddingPort } from "@domain/embedding/ports";
import type { ChatPort } from "@domain/llm/ports";
import type { SearchEnginePort } from "@domain/search/ports";
import { fetchDataset } from "@infrastructure/dataset/DatasetLoader";
import { AzureOpenAIEmbeddingProvider } from "@infrastructure/llm/EmbeddingProvider";
import {
  AzureOpenAIChatAdapter,
  createAzureOpenAIClient,
} from "@infrastructure/llm/OpenAIAdapter";
import {
  createElasticsearchClient,
  ElasticsearchGateway,
} from "@infrastructure/search/ElasticsearchGateway";
import type { Sleep } from "@utils/delay";

export interface AppServices {
  config: AppConfig;
  search: SearchEnginePort;
  chat: ChatPort;
  /** Absent when no embedding deployment is configured. */
  embeddings?: EmbeddingPort;
  loadDataset(url: string): Promise<DatasetRow[]>;
  /** Overrides the real timer for throttle, back-off and polling pauses. */
  sleep?: Sleep;
}

export function createAppServices(config: AppConfig): AppServices {
  const openai = createAzureOpenAIClient(config.openai);
  const { embeddingDeployment } = config.openai;

  return {
    config,
    search: new ElasticsearchGateway(
      createElasticsearchClient(config.elasticsearch)
    ),
    chat: new AzureOpenAIChatAdapter(openai),
    embeddings: embeddingDeployment
      ? new AzureOpenAIEmbeddingProvider(openai, embeddingDeployment)
      : undefined,
    loadDataset: (url) =>
      fetchDataset(url, {
        idField: config.dataset.idField,
        textField: config.dataset.textField,
        titleField: config.dataset.titleField,
      }),
  };
}
