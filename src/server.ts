/**
 * HTTP entry point.
 *
 * Loads `.env`, validates configuration once, wires the adapters and
 * starts the Express server.
 */
import { createAppServices } from "@app/services";
import { loadConfig } from "@config/index";
import { createHttpApp } from "@interfaces/http/app";
import { logger } from "@infrastructure/logging/Logger";
import dotenv from "dotenv";

dotenv.config();

const config = loadConfig();
const app = createHttpApp(createAppServices(config));

app.listen(config.port, () => {
  logger.log("info", "Server started", {
    url: `http://localhost:${config.port}`,
    chatDeployment: config.openai.chatDeployment,
    embeddingDeployment: config.openai.embeddingDeployment,
    inEngineModel: config.elasticsearch.embeddingModelId,
  });
});
