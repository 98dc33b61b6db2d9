import type { AppServices } from "@app/services";
import { createIngestController } from "@interfaces/http/IngestController";
import { Router } from "express";

export function createIngestRouter(services: AppServices): Router {
  const router = Router();
  router.post("/", createIngestController(services));
  return router;
}
