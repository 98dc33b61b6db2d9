import type { AppServices } from "@app/services";
import { createChatController } from "@interfaces/http/ChatController";
import { Router } from "express";

export function createChatRouter(services: AppServices): Router {
  const router = Router();
  router.post("/", createChatController(services));
  return router;
}
