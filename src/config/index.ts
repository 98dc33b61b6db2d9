/**
 * Application configuration.
 *
 * Built once at startup from the environment (after dotenv has loaded
 * `.env`) and passed explicitly to everything that needs it:
 * - Elasticsearch endpoint, encoded API key, optional in-engine model id
 * - Azure OpenAI resource endpoint or base URL override, key, deployments
 * - Dataset location and column names
 * - Batching, bulk and polling limits
 */
import { ValidationError } from "@middleware/errorHandler";
import { z } from "zod";

/** Per-call input limit of the embedding deployment. */
export const MAX_EMBEDDING_BATCH_SIZE = 16;
/** Largest bulk chunk the write endpoint accepts in this setup. */
export const MAX_BULK_CHUNK_SIZE = 10000;

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional();

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    ELASTICSEARCH_ENDPOINT: z.string().url(),
    ELASTICSEARCH_API_KEY: z.string().min(1),
    ELASTICSEARCH_EMBEDDING_MODEL_ID: optionalString,

    AZURE_OPENAI_ENDPOINT: optionalString.pipe(z.string().url().optional()),
    AZURE_OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
    AZURE_OPENAI_API_KEY: z.string().min(1),
    AZURE_OPENAI_API_VERSION: z.string().min(1).default("2024-05-01-preview"),
    AZURE_OPENAI_CHAT_DEPLOYMENT: z.string().min(1),
    AZURE_OPENAI_EMBEDDING_DEPLOYMENT: optionalString,
    AZURE_OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

    DATASET_URL: optionalString.pipe(z.string().url().optional()),
    DATASET_ID_FIELD: z.string().min(1).default("id"),
    DATASET_TEXT_FIELD: z.string().min(1).default("text"),
    DATASET_TITLE_FIELD: optionalString,

    EMBEDDING_BATCH_SIZE: z.coerce
      .number()
      .int()
      .min(1)
      .max(MAX_EMBEDDING_BATCH_SIZE)
      .default(MAX_EMBEDDING_BATCH_SIZE),
    EMBEDDING_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(20),
    EMBEDDING_THROTTLE_MS: z.coerce.number().int().min(0).default(500),
    EMBEDDING_BACKOFF_MS: z.coerce.number().int().min(0).default(5000),
    BULK_CHUNK_SIZE: z.coerce
      .number()
      .int()
      .min(1)
      .max(MAX_BULK_CHUNK_SIZE)
      .default(MAX_BULK_CHUNK_SIZE),
    TASK_POLL_INTERVAL_MS: z.coerce.number().int().min(1).default(1000),
  })
  .refine(
    (env) =>
      env.AZURE_OPENAI_ENDPOINT !== undefined ||
      env.AZURE_OPENAI_BASE_URL !== undefined,
    {
      message: "Set AZURE_OPENAI_ENDPOINT or AZURE_OPENAI_BASE_URL",
      path: ["AZURE_OPENAI_ENDPOINT"],
    }
  );

export interface AppConfig {
  env: string;
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";

  elasticsearch: {
    endpoint: string;
    apiKey: string;
    embeddingModelId?: string;
  };

  openai: {
    endpoint?: string;
    baseUrl?: string;
    apiKey: string;
    apiVersion: string;
    chatDeployment: string;
    embeddingDeployment?: string;
    timeoutMs: number;
  };

  dataset: {
    url?: string;
    idField: string;
    textField: string;
    titleField?: string;
  };

  embedding: {
    batchSize: number;
    maxAttempts: number;
    throttleMs: number;
    backoffMs: number;
  };

  bulk: {
    chunkSize: number;
  };

  tasks: {
    pollIntervalMs: number;
  };
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ValidationError("Invalid configuration", {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      ),
    });
  }

  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    elasticsearch: {
      endpoint: e.ELASTICSEARCH_ENDPOINT,
      apiKey: e.ELASTICSEARCH_API_KEY,
      embeddingModelId: e.ELASTICSEARCH_EMBEDDING_MODEL_ID,
    },
    openai: {
      endpoint: e.AZURE_OPENAI_ENDPOINT,
      baseUrl: e.AZURE_OPENAI_BASE_URL,
      apiKey: e.AZURE_OPENAI_API_KEY,
      apiVersion: e.AZURE_OPENAI_API_VERSION,
      chatDeployment: e.AZURE_OPENAI_CHAT_DEPLOYMENT,
      embeddingDeployment: e.AZURE_OPENAI_EMBEDDING_DEPLOYMENT,
      timeoutMs: e.AZURE_OPENAI_TIMEOUT_MS,
    },
    dataset: {
      url: e.DATASET_URL,
      idField: e.DATASET_ID_FIELD,
      textField: e.DATASET_TEXT_FIELD,
      titleField: e.DATASET_TITLE_FIELD,
    },
    embedding: {
      batchSize: e.EMBEDDING_BATCH_SIZE,
      maxAttempts: e.EMBEDDING_MAX_ATTEMPTS,
      throttleMs: e.EMBEDDING_THROTTLE_MS,
      backoffMs: e.EMBEDDING_BACKOFF_MS,
    },
    bulk: {
      chunkSize: e.BULK_CHUNK_SIZE,
    },
    tasks: {
      pollIntervalMs: e.TASK_POLL_INTERVAL_MS,
    },
  };
}
