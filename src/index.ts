/**
 * Entry point for the topic modeling server.
 */

import { resolve } from "node:path";

import {
  getConfig,
  configuredLogLevel,
  validateConfig,
  loadCorpusConfigFile,
  corpusFingerprint,
  ConfigError,
  CorpusConfigError,
} from "./config/index.js";
import { initRunId, createLogger, type Logger } from "./logging/index.js";
import { MemoCache, PersistentStore } from "./cache/index.js";
import { runPipeline } from "./corpus/index.js";
import { CooccurrenceEngine } from "./engine/index.js";
import { TopicService } from "./service/index.js";
import { createApp } from "./server/index.js";

async function main(): Promise<void> {
  // Initialize run ID first
  const runId = initRunId();

  // Console only until the configuration says where the log file goes
  let logger: Logger = createLogger({ file: false });

  try {
    const config = getConfig();
    validateConfig(config);

    logger = createLogger({
      level: configuredLogLevel(config),
      logDir: config.logDir,
      file: config.logToFile,
    });

    logger.info("Server starting", { runId });
    logger.info("Configuration loaded", {
      env: config.env,
      logLevel: config.logLevel,
      cacheDir: config.cacheDir,
      corpusConfig: config.corpusConfigPath,
      anchorCount: config.anchorCount,
      candidateCount: config.candidateCount,
    });

    const corpus = loadCorpusConfigFile(config.corpusConfigPath);
    const corpusName = `${corpus.name}-${corpusFingerprint(corpus)}`;
    const corpusLogger = logger.child("corpus");

    const service = new TopicService({
      corpusName,
      buildDataset: () => runPipeline(corpus, { logger: corpusLogger }),
      engine: new CooccurrenceEngine(),
      memo: new MemoCache(),
      store: new PersistentStore(resolve(config.cacheDir)),
      anchorCount: config.anchorCount,
      candidateCount: config.candidateCount,
      logger: logger.child("topics"),
    });
    service.warm();

    const app = await createApp(service, {
      staticDir: config.staticDir,
      userDataDir: resolve(config.userDataDir),
      logger,
    });
    const address = await app.listen({ host: config.host, port: config.port });
    logger.info("Server listening", { address });
  } catch (err) {
    if (err instanceof CorpusConfigError) {
      logger.error("Corpus configuration error", { message: err.format() });
    } else if (err instanceof ConfigError) {
      logger.error("Configuration error", { message: err.message, variable: err.variable });
    } else {
      logger.error("Startup failed", { error: err });
    }
    process.exit(1);
  }
}

void main();
