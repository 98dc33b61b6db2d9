/**
 * End-to-end walkthrough: for each retrieval mode, ingest the dataset into
 * its own index and ask the same question, printing the first answer.
 *
 *   npm run walkthrough -- "What does the dataset say about X?"
 *
 * Vector modes are skipped when their model or deployment is not configured.
 */
import { askIndex, embeddingForMode, fieldsMappingForMode } from "@app/chat/ChatUseCase";
import { ingestDataset, type RetrievalMode } from "@app/ingest/IngestUseCase";
import { createAppServices } from "@app/services";
import { type AppConfig, loadConfig } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import { errorMessage } from "@utils/errors";
import dotenv from "dotenv";

const INDEX_PREFIX = "grounded-walkthrough";

function enabledModes(config: AppConfig): RetrievalMode[] {
  const modes: RetrievalMode[] = ["lexical"];
  if (config.elasticsearch.embeddingModelId) {
    modes.push("in-engine-vector");
  }
  if (config.openai.embeddingDeployment) {
    modes.push("external-vector");
  }
  return modes;
}

async function run(question: string): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const services = createAppServices(config);

  for (const mode of enabledModes(config)) {
    const index = `${INDEX_PREFIX}-${mode}`;

    const ingested = await ingestDataset(services, { index, mode });
    logger.log("info", "Index ready", {
      mode,
      index,
      rows: ingested.rows,
      indexed: ingested.indexed,
    });

    const { answer } = await askIndex(services, {
      question,
      index,
      embedding: embeddingForMode(config, mode),
      fieldsMapping: fieldsMappingForMode(mode),
    });

    console.log(`=== ${mode} ===`);
    console.log(answer);
  }
}

const question = process.argv.slice(2).join(" ").trim();

if (!question) {
  console.error('Usage: npm run walkthrough -- "<question>"');
  process.exitCode = 1;
} else {
  run(question).catch((err: unknown) => {
    console.error("Walkthrough failed:", errorMessage(err));
    process.exitCode = 2;
  });
}
