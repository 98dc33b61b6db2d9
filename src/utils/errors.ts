/**
 * Helpers for reading status codes off errors thrown by the openai SDK,
 * the Elasticsearch client, fetch, or our own `AppError`s.
 */
const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 422]);

function readNumber(source: unknown, key: string): number | undefined {
  if (!source || typeof source !== "object") {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  return typeof value === "number" ? value : undefined;
}

/**
 * `statusCode` (AppError, Elasticsearch ResponseError), `status` (openai
 * APIError) or `response.status`, whichever is present first.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  return (
    readNumber(error, "statusCode") ??
    readNumber(error, "status") ??
    readNumber(Reflect.get(error, "response"), "status")
  );
}

/**
 * Opt-in retry predicate for the embedding batcher: permanent client errors
 * (bad request, auth, not found, unprocessable) are not retried, anything
 * else (rate limits, 5xx, network failures, unclassified) is.
 */
export function isTransientError(error: unknown): boolean {
  const status = httpStatusOf(error);
  if (status === undefined) {
    return true;
  }
  return !NON_RETRYABLE_STATUSES.has(status);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
