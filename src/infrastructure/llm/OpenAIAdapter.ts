/**
 * Azure OpenAI client setup and the grounded chat adapter.
 *
 * The chat request carries the Elasticsearch data source in the
 * `data_sources` body field; the provider runs retrieval and returns the
 * answer together with its citations in `message.context`. When the
 * resource sits behind a gateway, `baseUrl` replaces the endpoint as the
 * client's base URL instead of patching request paths.
 */
import type { AppConfig } from "@config/index";
import type {
  ChatPort,
  Citation,
  ElasticsearchDataSource,
  GroundedChatRequest,
  GroundedChatResponse,
} from "@domain/llm/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { errorMessage, httpStatusOf } from "@utils/errors";
import { AzureOpenAI } from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { z } from "zod";

export function createAzureOpenAIClient(
  config: AppConfig["openai"]
): AzureOpenAI {
  const common = {
    apiKey: config.apiKey,
    apiVersion: config.apiVersion,
    timeout: config.timeoutMs,
    // retries are owned by the embedding batcher; chat requests are not retried
    maxRetries: 0,
  };

  if (config.baseUrl) {
    return new AzureOpenAI({ ...common, baseURL: config.baseUrl });
  }
  return new AzureOpenAI({ ...common, endpoint: config.endpoint });
}

const MessageContextSchema = z.object({
  context: z
    .object({
      citations: z
        .array(
          z.object({
            content: z.string(),
            title: z.string().nullish(),
            url: z.string().nullish(),
            filepath: z.string().nullish(),
            chunk_id: z.string().nullish(),
          })
        )
        .default([]),
    })
    .optional(),
});

export function readCitations(message: unknown): Citation[] {
  const parsed = MessageContextSchema.safeParse(message);
  if (!parsed.success || !parsed.data.context) {
    return [];
  }

  return parsed.data.context.citations.map((c) => ({
    content: c.content,
    title: c.title ?? undefined,
    url: c.url ?? undefined,
    filepath: c.filepath ?? undefined,
    chunkId: c.chunk_id ?? undefined,
  }));
}

type GroundedCompletionBody = ChatCompletionCreateParamsNonStreaming & {
  data_sources: ElasticsearchDataSource[];
};

export class AzureOpenAIChatAdapter implements ChatPort {
  constructor(private readonly client: AzureOpenAI) {}

  async complete(request: GroundedChatRequest): Promise<GroundedChatResponse> {
    const body: GroundedCompletionBody = {
      model: request.deployment,
      messages: request.messages,
      data_sources: [request.dataSource],
    };

    const startedAt = Date.now();

    try {
      const completion = await this.client.chat.completions.create(body);

      logEvent("CHAT_COMPLETION_SUCCESS", {
        deployment: request.deployment,
        durationMs: Date.now() - startedAt,
        choices: completion.choices.length,
        totalTokens: completion.usage?.total_tokens,
      });

      return {
        choices: completion.choices.map((choice) => ({
          content: choice.message.content,
          citations: readCitations(choice.message),
        })),
      };
    } catch (error: unknown) {
      logEvent("CHAT_COMPLETION_FAILURE", {
        deployment: request.deployment,
        durationMs: Date.now() - startedAt,
        status: httpStatusOf(error),
        message: errorMessage(error),
      });
      throw error;
    }
  }
}
