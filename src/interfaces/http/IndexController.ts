import type { AppServices } from "@app/services";
import { recreateIndex } from "@domain/search/indexManager";
import {
  CreateIndexRequestSchema,
  IndexNameSchema,
} from "@interfaces/http/indexes/schema";
import { ValidationError } from "@middleware/errorHandler";
import type { Request, Response } from "express";

/**
 * Handler for PUT /api/indexes/:name: resets the index to the given mapping.
 */
export function createIndexController(services: AppServices) {
  return async function indexController(
    req: Request,
    res: Response
  ): Promise<void> {
    const name = IndexNameSchema.safeParse(req.params.name);
    const body = CreateIndexRequestSchema.safeParse(req.body);

    if (!name.success || !body.success) {
      throw new ValidationError("Invalid request", {
        issues: [
          ...(name.success ? [] : name.error.issues),
          ...(body.success ? [] : body.error.issues),
        ],
      });
    }

    await recreateIndex(services.search, name.data, body.data.mapping);

    res.status(201).json({
      status: "ok",
      index: name.data,
      fields: Object.keys(body.data.mapping),
    });
  };
}
