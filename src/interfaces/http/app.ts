import type { AppServices } from "@app/services";
import { errorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";
import express, { type Express } from "express";

export function createHttpApp(services: AppServices): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  registerRoutes(app, services);

  app.use(errorHandler);
  return app;
}
