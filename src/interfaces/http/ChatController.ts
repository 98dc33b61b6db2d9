/**
 * Grounded chat HTTP controller.
 *
 * Handler for POST /api/chat: validates the body, resolves embedding
 * parameters from `mode` when no explicit block is given, and returns the
 * first answer with its citations.
 */
import { askIndex, embeddingForMode, fieldsMappingForMode } from "@app/chat/ChatUseCase";
import type { AppServices } from "@app/services";
import {
  ChatRequestSchema,
  ChatResponseSchema,
} from "@interfaces/http/chat/schema";
import { ValidationError } from "@middleware/errorHandler";
import type { Request, Response } from "express";

export function createChatController(services: AppServices) {
  return async function chatController(
    req: Request,
    res: Response
  ): Promise<void> {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError("Invalid request", {
        issues: parsed.error.issues,
      });
    }

    const { mode, embedding, ...rest } = parsed.data;

    const result = await askIndex(services, {
      ...rest,
      embedding:
        embedding ?? (mode ? embeddingForMode(services.config, mode) : undefined),
      fieldsMapping: mode ? fieldsMappingForMode(mode) : undefined,
    });

    const checked = ChatResponseSchema.safeParse(result);
    if (!checked.success) {
      throw new ValidationError("Invalid response", 500, {
        issues: checked.error.issues,
      });
    }

    res.json(checked.data);
  };
}
