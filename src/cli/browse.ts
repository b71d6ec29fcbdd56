#!/usr/bin/env node
/**
 * CLI command to browse topics in the terminal.
 *
 * Usage:
 *   npx tsx src/cli/browse.ts [options]
 *   npm run browse -- --search headache
 *
 * Options:
 *   --topics <path>     Path to topics JSON (default: $TOPICS_PATH or topics/sample-topics.json)
 *   --category <name>   All, "Everyday Symptoms" or "Post-Diagnosis Companion"
 *   --search <text>     Match title and summaries
 *   --topic <id>        Show one topic in full
 *   --no-eli5           Hide the ELI5 summary
 *   --extra             Show extra detail where available
 *   --dev               Show developer safety warnings
 *   -h, --help          Show help
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  config,
  validateConfig,
  configuredLogLevel,
  ConfigError,
  DEFAULT_SAFETY_POLICY,
  type SafetyPolicy,
} from "../config/index.js";
import {
  readTopicsFile,
  filterTopics,
  parseCategoryFilter,
  CATEGORY_FILTERS,
  TopicLoadError,
  type TopicEntry,
  type CategoryFilter,
} from "../topics/index.js";
import {
  renderTopic,
  renderTopicList,
  SAFETY_BANNER,
  SAFETY_FOOTER,
} from "../render/topic-view.js";
import { createLogger, initRunId } from "../logging/index.js";

export interface BrowseOptions {
  category?: CategoryFilter;
  search?: string;
  /** Show this topic in full instead of the list */
  topicId?: string;
  eli5?: boolean;
  extraDetail?: boolean;
  devMode?: boolean;
  imagesDir?: string;
  devWarningLimit?: number;
  policy?: Readonly<SafetyPolicy>;
}

/**
 * Lines for one browse request: banner, body, footer.
 * Returns undefined when `topicId` names no loaded topic.
 */
export function browseTopics(
  entries: readonly TopicEntry[],
  options: BrowseOptions = {}
): string[] | undefined {
  let body: string[];

  if (options.topicId !== undefined) {
    const entry = entries.find((e) => e.id === options.topicId);
    if (!entry) {
      return undefined;
    }
    body = renderTopic(entry, {
      eli5: options.eli5,
      extraDetail: options.extraDetail,
      devMode: options.devMode,
      imagesDir: options.imagesDir,
      devWarningLimit: options.devWarningLimit,
      policy: options.policy,
    });
  } else {
    body = renderTopicList(
      filterTopics(entries, { category: options.category, query: options.search })
    );
  }

  return [SAFETY_BANNER, "", ...body, "", SAFETY_FOOTER];
}

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      topics: { type: "string", default: config.topicsPath },
      category: { type: "string" },
      search: { type: "string" },
      topic: { type: "string" },
      "no-eli5": { type: "boolean", default: false },
      extra: { type: "boolean", default: false },
      dev: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: browse [options]

Options:
  --topics <path>     Path to topics JSON (default: ${config.topicsPath})
  --category <name>   ${CATEGORY_FILTERS.join(" | ")}
  --search <text>     Match title and summaries
  --topic <id>        Show one topic in full
  --no-eli5           Hide the ELI5 summary
  --extra             Show extra detail where available
  --dev               Show developer safety warnings
  -h, --help          Show this help message
`);
    process.exit(0);
  }

  return values;
}

function main(): void {
  const args = parseCliArgs();
  initRunId();

  const logger = createLogger({
    level: configuredLogLevel(),
    file: config.logToFile,
    context: { command: "browse" },
  });

  try {
    validateConfig();

    const category = parseCategoryFilter(args.category, CATEGORY_FILTERS);
    if (category === undefined) {
      throw new ConfigError(
        `Unknown category "${args.category}". Use one of: ${CATEGORY_FILTERS.join(", ")}`
      );
    }

    const loaded = readTopicsFile(resolve(args.topics ?? config.topicsPath), {
      mode: "lenient",
    });
    for (const rejected of loaded.rejected) {
      logger
        .child({ topic: rejected.id })
        .warn("Topic skipped", { reason: rejected.reason, index: rejected.index });
    }
    if (loaded.errors.length > 0) {
      logger.warn("Some topics were skipped", {
        skipped: loaded.stats.invalid + loaded.stats.duplicates,
        loaded: loaded.stats.loaded,
      });
    }

    const lines = browseTopics(loaded.entries, {
      category,
      search: args.search,
      topicId: args.topic,
      eli5: !args["no-eli5"],
      extraDetail: args.extra,
      devMode: args.dev,
      imagesDir: config.imagesDir,
      devWarningLimit: config.devWarningLimit,
      policy: DEFAULT_SAFETY_POLICY,
    });

    if (lines === undefined) {
      logger.error("Topic not found", { topic: args.topic });
      process.exit(1);
    }

    console.log(lines.join("\n"));
  } catch (err) {
    if (err instanceof TopicLoadError) {
      logger.error(err.message);
      console.error(err.format());
      process.exit(1);
    }
    if (err instanceof ConfigError) {
      logger.error("Configuration error", { message: err.message, key: err.key });
      process.exit(1);
    }
    throw err;
  }
}

const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("browse.ts") || process.argv[1].endsWith("browse.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err) {
    console.error("Unexpected error:", err);
    process.exit(1);
  }
}
