import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { app } from "./app.js";
import { appConfig, projectRoot } from "./config.js";
import { ConfigurationError } from "./errors.js";
import {
  ensureVectorStoreConnected,
  getIngestionPipelineSingleton,
  getQAServiceSingleton
} from "./runtime/ragRuntime.js";
import { logger } from "./utils/logger.js";

async function start(): Promise<void> {
  getQAServiceSingleton();
  await ensureVectorStoreConnected();

  const docsDir = resolve(projectRoot, appConfig.DOCS_DIR);
  if (existsSync(docsDir)) {
    const result = await getIngestionPipelineSingleton().ingestFolder(docsDir, { clearExisting: false });
    logger.info(
      { docsDir, ingested: result.ingested.length, skipped: result.skipped.length, failed: result.failed.length },
      "Startup course load finished"
    );
  } else {
    logger.warn({ docsDir }, "Course folder not found; starting with an empty index");
  }

  app.listen(appConfig.PORT, () => {
    logger.info(`Course assistant backend is running on http://localhost:${appConfig.PORT}`);
  });
}

start().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.fatal({ err: error }, "Invalid configuration");
  } else {
    logger.fatal({ err: error }, "Backend failed to start");
  }
  process.exit(1);
});
