/**
 * Entry point: load the topic dataset and report its safety status.
 */

import { resolve } from "node:path";
import { config, validateConfig, configuredLogLevel, ConfigError } from "./config/index.js";
import { initRunId, createLogger } from "./logging/index.js";
import { readTopicsFile, TopicLoadError } from "./topics/index.js";
import { scanTopic } from "./safety/index.js";

function main(): void {
  const runId = initRunId();

  const logger = createLogger({
    level: configuredLogLevel(),
    file: config.logToFile,
  });

  try {
    validateConfig();

    logger.info("Application starting", { runId });
    logger.info("Configuration loaded", {
      env: config.env,
      debug: config.debug,
      logLevel: config.logLevel,
      appName: config.appName,
      topicsPath: config.topicsPath,
    });

    const loaded = readTopicsFile(resolve(config.topicsPath), { mode: "lenient" });
    logger.info("Topics loaded", loaded.stats);

    for (const issue of loaded.errors) {
      logger.warn("Topic skipped", { ...issue });
    }

    let flagged = 0;
    for (const entry of loaded.entries) {
      const warnings = scanTopic(entry.source);
      if (warnings.length > 0) {
        flagged++;
        logger.child({ topic: entry.id }).debug("Safety warnings", { count: warnings.length });
      }
    }

    logger.info("Application initialized successfully", {
      topics: loaded.entries.length,
      topicsWithWarnings: flagged,
    });
  } catch (err) {
    if (err instanceof ConfigError || err instanceof TopicLoadError) {
      logger.error(err.name, { message: err.message });
      process.exit(1);
    }
    throw err;
  }
}

main();
