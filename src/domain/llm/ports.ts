/**
 * Domain port for grounded chat completions.
 *
 * The request carries a single "data source" attachment telling the hosted
 * model where to retrieve grounding documents. The shapes below mirror the
 * wire format of the provider's Elasticsearch data source.
 */
export type QueryType = "simple" | "vector";

export type EmbeddingDependency =
  | { type: "model_id"; model_id: string }
  | {
      type: "endpoint";
      endpoint: string;
      authentication: { type: "api_key"; key: string };
    }
  | { type: "deployment_name"; deployment_name: string };

export interface FieldsMapping {
  content_fields?: string[];
  title_field?: string;
  url_field?: string;
  filepath_field?: string;
  vector_fields?: string[];
}

export interface ElasticsearchDataSource {
  type: "elasticsearch";
  parameters: {
    endpoint: string;
    index_name: string;
    authentication: { type: "encoded_api_key"; encoded_api_key: string };
    query_type: QueryType;
    embedding_dependency?: EmbeddingDependency;
    fields_mapping?: FieldsMapping;
    top_n_documents?: number;
    strictness?: number;
    in_scope?: boolean;
    role_information?: string;
  };
}

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface GroundedChatRequest {
  deployment: string;
  messages: ChatMessage[];
  dataSource: ElasticsearchDataSource;
}

export interface Citation {
  content: string;
  title?: string;
  url?: string;
  filepath?: string;
  chunkId?: string;
}

export interface GroundedChatChoice {
  content: string | null;
  citations: Citation[];
}

export interface GroundedChatResponse {
  choices: GroundedChatChoice[];
}

export interface ChatPort {
  complete(request: GroundedChatRequest): Promise<GroundedChatResponse>;
}
