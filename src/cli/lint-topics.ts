#!/usr/bin/env node
/**
 * CLI command to run the content safety scanner over every topic.
 *
 * Reports, per topic:
 * - Banned phrases (prescriptive or diagnostic wording)
 * - Sentences over the word limit
 *
 * Usage:
 *   npx tsx src/cli/lint-topics.ts [options]
 *   npm run lint-topics
 *
 * Options:
 *   --topics <path>   Path to topics JSON (default: $TOPICS_PATH or topics/sample-topics.json)
 *   --policy <path>   Safety policy JSON layered over the defaults
 *   --limit <n>       Warnings shown per topic (default: $DEV_WARNING_LIMIT or 8)
 *   --json            Output the report as JSON (for CI parsing)
 *   --strict          Exit 1 when any warning is found
 *   -h, --help        Show help
 *
 * Every object record is scanned, including topics the loader refused
 * (malformed id, duplicate id). Their load issues are listed beside their
 * warnings.
 *
 * Exit codes:
 *   0 - All topics loaded (and, under --strict, no warnings)
 *   1 - Unreadable topics file, load issues, bad options, or warnings under --strict
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  config,
  validateConfig,
  configuredLogLevel,
  ConfigError,
  DEFAULT_SAFETY_POLICY,
  readSafetyPolicyFile,
  SafetyPolicyError,
  type SafetyPolicy,
} from "../config/index.js";
import {
  readTopicsFile,
  formatLoadReport,
  displayTitle,
  TopicLoadError,
  type TopicIssue,
  type TopicLoadResult,
} from "../topics/index.js";
import { scanTopic, formatWarning, type SafetyWarning } from "../safety/index.js";
import { createLogger, initRunId } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface TopicLintResult {
  id: string;
  index: number;
  title: string;
  /** False when the loader refused the record. It is scanned all the same. */
  loaded: boolean;
  issues: TopicIssue[];
  warnings: SafetyWarning[];
}

export interface LintReport {
  policy: {
    bannedPhrases: number;
    maxSentenceWords: number;
  };
  topics: TopicLintResult[];
  /** Load issues not tied to a scanned record (e.g. a topic that is not an object) */
  loadIssues: TopicIssue[];
  summary: {
    topicsScanned: number;
    topicsWithWarnings: number;
    topicsRejected: number;
    totalWarnings: number;
    bannedPhrases: number;
    longSentences: number;
    loadIssues: number;
  };
}

// ============================================================
// Linting
// ============================================================

interface ScannedRecord {
  id: string;
  index: number;
  title: string;
  loaded: boolean;
  source: Readonly<Record<string, unknown>>;
}

/**
 * Scan every object record of a load, loaded or refused, in file order.
 * Load issues are reported beside the warnings of the record they concern.
 */
export function lintTopics(
  loaded: Pick<TopicLoadResult, "entries" | "rejected" | "errors">,
  policy: Readonly<SafetyPolicy> = DEFAULT_SAFETY_POLICY
): LintReport {
  const records: ScannedRecord[] = [
    ...loaded.entries.map((entry) => ({
      id: entry.id,
      index: entry.index,
      title: entry.topic.title,
      loaded: true,
      source: entry.source,
    })),
    ...loaded.rejected.map((rejected) => ({
      id: rejected.id,
      index: rejected.index,
      title: displayTitle(rejected.source),
      loaded: false,
      source: rejected.source,
    })),
  ].sort((a, b) => a.index - b.index);

  const topics = records.map((record) => ({
    id: record.id,
    index: record.index,
    title: record.title,
    loaded: record.loaded,
    issues: loaded.errors.filter((issue) => issue.index === record.index),
    warnings: scanTopic(record.source, policy),
  }));

  const scanned = new Set(records.map((record) => record.index));
  const loadIssues = loaded.errors.filter(
    (issue) => issue.index === undefined || !scanned.has(issue.index)
  );

  const all = topics.flatMap((t) => t.warnings);

  return {
    policy: {
      bannedPhrases: policy.bannedPhrases.length,
      maxSentenceWords: policy.maxSentenceWords,
    },
    topics,
    loadIssues,
    summary: {
      topicsScanned: topics.length,
      topicsWithWarnings: topics.filter((t) => t.warnings.length > 0).length,
      topicsRejected: topics.filter((t) => !t.loaded).length,
      totalWarnings: all.length,
      bannedPhrases: all.filter((w) => w.kind === "banned_phrase").length,
      longSentences: all.filter((w) => w.kind === "long_sentence").length,
      loadIssues: loaded.errors.length,
    },
  };
}

/**
 * Human-readable report. At most `limit` warnings are listed per topic;
 * load issues are always listed in full.
 */
export function formatLintReport(report: LintReport, limit: number): string {
  const lines: string[] = [];

  lines.push("═".repeat(60));
  lines.push(" Content Safety Lint");
  lines.push("═".repeat(60));
  lines.push("");

  for (const topic of report.topics) {
    if (topic.warnings.length === 0 && topic.issues.length === 0) {
      lines.push(`✓ ${topic.title} (${topic.id})`);
      continue;
    }

    const counts = [`${topic.warnings.length} warning(s)`];
    if (topic.issues.length > 0) {
      counts.push(`${topic.issues.length} load issue(s)`);
    }
    lines.push(`✗ ${topic.title} (${topic.id}): ${counts.join(", ")}`);

    for (const issue of topic.issues) {
      lines.push(`    ! ${issue.field}: ${issue.message}`);
    }
    for (const warning of topic.warnings.slice(0, limit)) {
      lines.push(`    • ${formatWarning(warning)}`);
    }
    const hidden = topic.warnings.length - limit;
    if (hidden > 0) {
      lines.push(`    … ${hidden} more`);
    }
  }

  if (report.loadIssues.length > 0) {
    lines.push("");
    lines.push("Load issues:");
    for (const issue of report.loadIssues) {
      const location = issue.index !== undefined ? `[#${issue.index}] ` : "";
      lines.push(`  ! ${location}${issue.field}: ${issue.message}`);
    }
  }

  const { summary } = report;
  lines.push("");
  lines.push("─".repeat(60));
  lines.push(
    `Scanned ${summary.topicsScanned} topic(s): ${summary.topicsWithWarnings} with warnings, ` +
      `${summary.totalWarnings} warning(s) total ` +
      `(${summary.bannedPhrases} banned phrase, ${summary.longSentences} long sentence)`
  );
  if (summary.loadIssues > 0) {
    lines.push(
      `Load issues: ${summary.loadIssues} (${summary.topicsRejected} topic(s) not loaded)`
    );
  }
  lines.push("─".repeat(60));

  return lines.join("\n");
}

/**
 * Parse a positive integer option. Returns undefined when invalid.
 */
export function parseLimit(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const parsed = parseInt(value, 10);
  return parsed >= 1 ? parsed : undefined;
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      topics: { type: "string", default: config.topicsPath },
      policy: { type: "string" },
      limit: { type: "string", default: String(config.devWarningLimit) },
      json: { type: "boolean", default: false },
      strict: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: lint-topics [options]

Options:
  --topics <path>   Path to topics JSON (default: ${config.topicsPath})
  --policy <path>   Safety policy JSON layered over the defaults
  --limit <n>       Warnings shown per topic (default: ${config.devWarningLimit})
  --json            Output the report as JSON (for CI parsing)
  --strict          Exit 1 when any warning is found
  -h, --help        Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Main
// ============================================================

function main(): void {
  const args = parseCliArgs();
  const runId = initRunId();
  const isJson = args.json === true;

  const logger = createLogger({
    level: configuredLogLevel(),
    file: config.logToFile,
    // stdout carries the JSON report
    console: !isJson,
    context: { command: "lint-topics" },
  });

  try {
    validateConfig();

    const limit = parseLimit(args.limit ?? "");
    if (limit === undefined) {
      throw new ConfigError(`--limit must be a positive integer, got: ${args.limit}`);
    }

    const policy = args.policy
      ? readSafetyPolicyFile(resolve(args.policy))
      : DEFAULT_SAFETY_POLICY;

    const topicsPath = resolve(args.topics ?? config.topicsPath);
    logger.debug("Loading topics", { topicsPath, runId });
    const loaded = readTopicsFile(topicsPath, { mode: "lenient" });

    // Lenient loads only fail when the collection itself is malformed
    if (!loaded.success) {
      logger.error("Topics failed validation", { errors: loaded.errors.length });
      console.log(isJson ? JSON.stringify({ load: loaded }, null, 2) : formatLoadReport(loaded));
      process.exit(1);
    }

    const report = lintTopics(loaded, policy);
    for (const topic of report.topics) {
      const topicLogger = logger.child({ topic: topic.id });
      for (const issue of topic.issues) {
        topicLogger.warn("Load issue", { field: issue.field, message: issue.message });
      }
      topicLogger.debug("Scanned", { warnings: topic.warnings.length });
    }
    logger.info("Scan complete", report.summary);

    console.log(isJson ? JSON.stringify(report, null, 2) : formatLintReport(report, limit));

    const failed =
      report.summary.loadIssues > 0 || (args.strict && report.summary.totalWarnings > 0);
    process.exit(failed ? 1 : 0);
  } catch (err) {
    if (
      err instanceof TopicLoadError ||
      err instanceof SafetyPolicyError
    ) {
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
  (process.argv[1].endsWith("lint-topics.ts") || process.argv[1].endsWith("lint-topics.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err) {
    console.error("Unexpected error:", err);
    process.exit(1);
  }
}
