/**
 * Question answering against one of the walkthrough's indexes.
 *
 * Fills in the engine and provider details from the AppConfig and hands
 * the request to the query dispatcher.
 */
import type { RetrievalMode } from "@app/ingest/IngestUseCase";
import type { AppServices } from "@app/services";
import type { AppConfig } from "@config/index";
import {
  dispatchQuery,
  type EmbeddingParams,
  type QueryAnswer,
  type RetrievalTuning,
} from "@domain/chat/queryDispatcher";
import {
  EXTERNAL_VECTOR_FIELD,
  IN_ENGINE_VECTOR_FIELD,
} from "@domain/search/mappings";
import { ValidationError } from "@middleware/errorHandler";

export interface AskRequest extends RetrievalTuning {
  question: string;
  index: string;
  embedding?: EmbeddingParams;
}

/**
 * Embedding parameters matching the way `mode` indexed its documents.
 * The provider's own embedding deployment is addressed by its full
 * embeddings URL when the resource endpoint is known, by deployment name
 * otherwise.
 */
export function embeddingForMode(
  config: AppConfig,
  mode: RetrievalMode
): EmbeddingParams | undefined {
  switch (mode) {
    case "lexical":
      return undefined;
    case "in-engine-vector": {
      const modelId = config.elasticsearch.embeddingModelId;
      if (!modelId) {
        throw new ValidationError(
          "in-engine-vector mode needs ELASTICSEARCH_EMBEDDING_MODEL_ID"
        );
      }
      return { modelId };
    }
    case "external-vector": {
      const { embeddingDeployment, endpoint, apiKey, apiVersion } =
        config.openai;
      if (!embeddingDeployment) {
        throw new ValidationError(
          "external-vector mode needs AZURE_OPENAI_EMBEDDING_DEPLOYMENT"
        );
      }
      if (!endpoint) {
        return { deploymentName: embeddingDeployment };
      }
      const base = endpoint.replace(/\/+$/, "");
      return {
        endpoint: `${base}/openai/deployments/${embeddingDeployment}/embeddings?api-version=${apiVersion}`,
        key: apiKey,
      };
    }
  }
}

/** Content and vector fields the provider should read for `mode`. */
export function fieldsMappingForMode(
  mode: RetrievalMode
): RetrievalTuning["fieldsMapping"] {
  switch (mode) {
    case "lexical":
      return { content_fields: ["text"], title_field: "title" };
    case "in-engine-vector":
      return {
        content_fields: ["text"],
        title_field: "title",
        vector_fields: [IN_ENGINE_VECTOR_FIELD],
      };
    case "external-vector":
      return {
        content_fields: ["text"],
        title_field: "title",
        vector_fields: [EXTERNAL_VECTOR_FIELD],
      };
  }
}

export async function askIndex(
  services: AppServices,
  request: AskRequest
): Promise<QueryAnswer> {
  const { config } = services;

  return dispatchQuery(services.chat, {
    ...request,
    deployment: config.openai.chatDeployment,
    engineEndpoint: config.elasticsearch.endpoint,
    engineApiKey: config.elasticsearch.apiKey,
  });
}
