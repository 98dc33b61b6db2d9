/**
 * Health check route: GET /api/health pings the search engine.
 */
import type { AppServices } from "@app/services";
import { errorMessage } from "@utils/errors";
import { Router } from "express";

export function createHealthRouter(services: AppServices): Router {
  const router = Router();

  router.get("/", async (_req, res) => {
    try {
      const reachable = await services.search.ping();
      res.status(reachable ? 200 : 503).json({
        status: reachable ? "ok" : "error",
        search: reachable ? "connected" : "disconnected",
      });
    } catch (error: unknown) {
      res.status(503).json({
        status: "error",
        search: "disconnected",
        detail: errorMessage(error),
      });
    }
  });

  return router;
}
