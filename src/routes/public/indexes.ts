import type { AppServices } from "@app/services";
import { createIndexController } from "@interfaces/http/IndexController";
import { Router } from "express";

export function createIndexRouter(services: AppServices): Router {
  const router = Router();
  router.put("/:name", createIndexController(services));
  return router;
}
