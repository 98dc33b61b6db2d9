/**
 * Error types and the global Express error middleware.
 *
 * Every failure that leaves a pipeline step is either one of the `AppError`
 * subclasses below or the engine/provider error it wraps. The middleware
 * turns either into `{ error: { message, code, details } }` with the
 * matching status code.
 */
import { logger } from "@infrastructure/logging/Logger";
import { httpStatusOf } from "@utils/errors";
import type { NextFunction, Request, Response } from "express";

export type AppErrorType =
  | "InfrastructureError"
  | "AppError"
  | "ValidationError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "InfrastructureError", statusCode, metadata);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata);
    } else {
      super(message, "ValidationError", 400, statusOrMeta);
    }
  }
}

export interface EmbeddingBatchFailure {
  batchIndex: number;
  offset: number;
  size: number;
  attempts: number;
}

/**
 * Raised when one embedding batch could not be resolved. The whole run is
 * abandoned; `cause` holds the last provider error.
 */
export class EmbeddingBatchError extends InfrastructureError {
  public readonly batch: EmbeddingBatchFailure;

  constructor(batch: EmbeddingBatchFailure, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Embedding batch ${batch.batchIndex} (rows ${batch.offset}-${
        batch.offset + batch.size - 1
      }) failed after ${batch.attempts} attempt(s): ${reason}`,
      502,
      { ...batch, reason }
    );
    this.batch = batch;
    this.cause = cause;
  }
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  let appError: AppError;

  if (err instanceof AppError) {
    appError = err;
  } else {
    const message =
      err instanceof Error && err.message ? err.message : "Internal Server Error";

    appError = new InfrastructureError(message, httpStatusOf(err) ?? 500, {
      originalError: err instanceof Error ? err.name : String(err),
    });
  }

  const status = appError.statusCode ?? 500;

  logger.log("error", "Unhandled error", {
    type: appError.type,
    statusCode: status,
    message: appError.message,
    metadata: appError.metadata,
  });

  res.status(status).json({
    error: {
      message: appError.message,
      code: appError.type,
      details: appError.metadata ?? {},
    },
  });
}
