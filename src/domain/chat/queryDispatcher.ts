/**
 * Grounded question answering over an Elasticsearch index.
 *
 * Picks the query type from the embedding parameters, builds the
 * Elasticsearch data source attachment and sends one chat request. Only the
 * first returned choice is used.
 */
import type {
  ChatPort,
  Citation,
  ElasticsearchDataSource,
  EmbeddingDependency,
  FieldsMapping,
  QueryType,
} from "@domain/llm/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  InfrastructureError,
  ValidationError,
} from "@middleware/errorHandler";

export interface EmbeddingParams {
  /** Model deployed inside the search engine. */
  modelId?: string;
  /** Externally hosted embedding endpoint; needs `key` too. */
  endpoint?: string;
  key?: string;
  /** Embedding deployment on the chat provider's own resource. */
  deploymentName?: string;
}

export interface RetrievalTuning {
  topNDocuments?: number;
  strictness?: number;
  inScope?: boolean;
  roleInformation?: string;
  fieldsMapping?: FieldsMapping;
}

export interface QueryParams extends RetrievalTuning {
  question: string;
  deployment: string;
  engineEndpoint: string;
  engineApiKey: string;
  index: string;
  embedding?: EmbeddingParams;
}

export interface QueryAnswer {
  answer: string;
  citations: Citation[];
  queryType: QueryType;
}

/**
 * Endpoint + key first, then an in-engine model id, then a provider
 * deployment. Undefined means lexical retrieval.
 */
export function resolveEmbeddingDependency(
  embedding: EmbeddingParams = {}
): EmbeddingDependency | undefined {
  const { modelId, endpoint, key, deploymentName } = embedding;

  if ((endpoint && !key) || (!endpoint && key)) {
    throw new ValidationError(
      "An external embedding endpoint and its key must be supplied together",
      { endpoint: Boolean(endpoint), key: Boolean(key) }
    );
  }

  if (endpoint && key) {
    return {
      type: "endpoint",
      endpoint,
      authentication: { type: "api_key", key },
    };
  }
  if (modelId) {
    return { type: "model_id", model_id: modelId };
  }
  if (deploymentName) {
    return { type: "deployment_name", deployment_name: deploymentName };
  }
  return undefined;
}

export function selectQueryType(embedding?: EmbeddingParams): QueryType {
  return resolveEmbeddingDependency(embedding) ? "vector" : "simple";
}

export function buildDataSource(params: QueryParams): ElasticsearchDataSource {
  const dependency = resolveEmbeddingDependency(params.embedding);

  const parameters: ElasticsearchDataSource["parameters"] = {
    endpoint: params.engineEndpoint,
    index_name: params.index,
    authentication: {
      type: "encoded_api_key",
      encoded_api_key: params.engineApiKey,
    },
    query_type: dependency ? "vector" : "simple",
  };

  if (dependency) {
    parameters.embedding_dependency = dependency;
  }
  if (params.fieldsMapping) {
    parameters.fields_mapping = params.fieldsMapping;
  }
  if (params.topNDocuments !== undefined) {
    parameters.top_n_documents = params.topNDocuments;
  }
  if (params.strictness !== undefined) {
    parameters.strictness = params.strictness;
  }
  if (params.inScope !== undefined) {
    parameters.in_scope = params.inScope;
  }
  if (params.roleInformation !== undefined) {
    parameters.role_information = params.roleInformation;
  }

  return { type: "elasticsearch", parameters };
}

export async function dispatchQuery(
  chat: ChatPort,
  params: QueryParams
): Promise<QueryAnswer> {
  const question = params.question.trim();
  if (!question) {
    throw new ValidationError("question is required");
  }

  const dataSource = buildDataSource({ ...params, question });
  const queryType = dataSource.parameters.query_type;
  const startedAt = Date.now();

  const response = await chat.complete({
    deployment: params.deployment,
    messages: [{ role: "user", content: question }],
    dataSource,
  });

  const first = response.choices[0];
  if (!first || !first.content) {
    throw new InfrastructureError("Chat model returned no answer", 502, {
      index: params.index,
      choices: response.choices.length,
    });
  }

  logEvent("GROUNDED_CHAT", {
    deployment: params.deployment,
    index: params.index,
    queryType,
    durationMs: Date.now() - startedAt,
    citations: first.citations.length,
  });

  return { answer: first.content, citations: first.citations, queryType };
}
