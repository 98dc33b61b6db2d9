/**
 * Dataset ingestion HTTP controller.
 *
 * Handler for POST /api/documents/ingest: validates the body and runs the
 * ingest use case for the requested retrieval mode.
 */
import { ingestDataset } from "@app/ingest/IngestUseCase";
import type { AppServices } from "@app/services";
import { IngestRequestSchema } from "@interfaces/http/ingest/schema";
import { ValidationError } from "@middleware/errorHandler";
import type { Request, Response } from "express";

export function createIngestController(services: AppServices) {
  return async function ingestController(
    req: Request,
    res: Response
  ): Promise<void> {
    const parsed = IngestRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError("Invalid request", {
        issues: parsed.error.issues,
      });
    }

    const result = await ingestDataset(services, parsed.data);

    res.json({ status: "ok", ...result });
  };
}
