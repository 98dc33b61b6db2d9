/**
 * Express route registration.
 *
 * - GET  /api/health            search engine connectivity
 * - PUT  /api/indexes/:name     reset an index to a mapping
 * - POST /api/documents/ingest  load the dataset for one retrieval mode
 * - POST /api/chat              grounded answer from one index
 */
import type { AppServices } from "@app/services";
import { createChatRouter } from "@routes/public/chat";
import { createHealthRouter } from "@routes/public/health";
import { createIndexRouter } from "@routes/public/indexes";
import { createIngestRouter } from "@routes/public/ingest";
import type { Express } from "express";

export function registerRoutes(app: Express, services: AppServices): void {
  app.use("/api/health", createHealthRouter(services));
  app.use("/api/indexes", createIndexRouter(services));
  app.use("/api/documents/ingest", createIngestRouter(services));
  app.use("/api/chat", createChatRouter(services));
}
