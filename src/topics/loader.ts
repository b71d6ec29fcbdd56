/**
 * Topic loader and validator.
 *
 * Responsible for:
 * - Reading the topic dataset (JSON) from disk
 * - Validating each topic against the schema, one by one
 * - Deriving stable topic ids and rejecting duplicates
 * - Keeping the record exactly as authored for the safety scanner
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * LOAD MODES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. STRICT MODE (default):
 *    - Any invalid topic fails the whole load
 *    - No entries are returned
 *
 * 2. LENIENT MODE (used by the browser and lint-topics):
 *    - Invalid topics and later duplicates are dropped
 *    - Valid topics still load; issues are reported alongside
 *
 * In both modes, object records that were refused are listed under
 * `rejected` with their authored source, so they can still be scanned.
 */

import { existsSync, readFileSync } from "node:fs";
import { TopicSchema, TopicCollectionSchema, UNTITLED, type Topic } from "./schema.js";

/**
 * Validation error for topic loading.
 */
export class TopicLoadError extends Error {
  public readonly issues: TopicIssue[];

  constructor(message: string, issues: TopicIssue[]) {
    super(message);
    this.name = "TopicLoadError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Topic loading failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issueLocation(issue)} ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual topic loading issue.
 */
export interface TopicIssue {
  /** Topic ID when it could be determined */
  topicId?: string;
  /** Position of the topic in the file */
  index?: number;
  /** Field that has the issue */
  field: string;
  /** Human-readable error message */
  message: string;
  /** Error type for programmatic handling */
  type: "file" | "schema" | "duplicate";
}

/**
 * A loaded topic.
 *
 * `topic` is the schema-parsed view used for display and filtering.
 * `source` is the record as authored. Scan `source`: it keeps fields the
 * schema does not know and the authored field order.
 */
export interface TopicEntry {
  readonly id: string;
  readonly index: number;
  readonly topic: Readonly<Topic>;
  readonly source: Readonly<Record<string, unknown>>;
}

/**
 * An object record the loader refused: a malformed id, or an id already
 * taken by an earlier topic.
 */
export interface RejectedTopic {
  readonly id: string;
  readonly index: number;
  readonly reason: "schema" | "duplicate";
  readonly source: Readonly<Record<string, unknown>>;
}

export interface LoadTopicsOptions {
  /**
   * - "strict": any issue fails the load (default)
   * - "lenient": invalid topics are dropped, valid ones load
   */
  mode?: "strict" | "lenient";
}

export interface TopicLoadResult {
  success: boolean;
  entries: TopicEntry[];
  rejected: RejectedTopic[];
  errors: TopicIssue[];
  stats: {
    total: number;
    loaded: number;
    invalid: number;
    duplicates: number;
  };
}

function issueLocation(issue: TopicIssue): string {
  if (issue.topicId) return `[${issue.topicId}]`;
  if (issue.index !== undefined) return `[#${issue.index}]`;
  return "[collection]";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Lowercase slug with underscores: "High Blood Pressure" → "high_blood_pressure".
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Title as authored, or "" when the record has none.
 */
export function authoredTitle(record: Readonly<Record<string, unknown>>): string {
  return typeof record.title === "string" ? record.title : "";
}

/**
 * Title to show for an authored record.
 */
export function displayTitle(record: Readonly<Record<string, unknown>>): string {
  return authoredTitle(record) || UNTITLED;
}

/**
 * Topic id: the explicit id, else the title slug, else the position.
 */
export function topicIdFor(topic: { id?: string; title: string }, index: number): string {
  if (topic.id) return topic.id;
  const slug = slugify(topic.title);
  return slug !== "" ? slug : `topic_${index}`;
}

/**
 * Load and validate topics from a parsed JSON value.
 *
 * @example
 *   const result = loadTopics(JSON.parse(text), { mode: "lenient" });
 *   for (const entry of result.entries) {
 *     scanTopic(entry.source);
 *   }
 */
export function loadTopics(
  input: unknown,
  options: LoadTopicsOptions = {}
): TopicLoadResult {
  const { mode = "strict" } = options;

  const collectionResult = TopicCollectionSchema.safeParse(input);
  if (!collectionResult.success) {
    return {
      success: false,
      entries: [],
      rejected: [],
      errors: [
        {
          field: "(root)",
          message: "Topics file must be an array of topics or an object with a \"topics\" array",
          type: "schema",
        },
      ],
      stats: { total: 0, loaded: 0, invalid: 0, duplicates: 0 },
    };
  }

  const data = collectionResult.data;
  const items = Array.isArray(data) ? data : data.topics;

  const errors: TopicIssue[] = [];
  const entries: TopicEntry[] = [];
  const rejected: RejectedTopic[] = [];
  const seen = new Map<string, number>();
  let invalid = 0;
  let duplicates = 0;

  items.forEach((item, index) => {
    if (!isRecord(item)) {
      invalid++;
      errors.push({
        index,
        field: "(root)",
        message: `Topic must be an object, got ${item === null ? "null" : Array.isArray(item) ? "array" : typeof item}`,
        type: "schema",
      });
      return;
    }

    const parsed = TopicSchema.safeParse(item);
    if (!parsed.success) {
      invalid++;
      const rawId = typeof item.id === "string" ? item.id : undefined;
      rejected.push({
        id: rawId ?? topicIdFor({ title: authoredTitle(item) }, index),
        index,
        reason: "schema",
        source: item,
      });
      for (const issue of parsed.error.issues) {
        errors.push({
          topicId: rawId,
          index,
          field: issue.path.join(".") || "(root)",
          message: issue.message,
          type: "schema",
        });
      }
      return;
    }

    // Derive from the authored title: untitled topics must not share an id
    const id = topicIdFor({ id: parsed.data.id, title: authoredTitle(item) }, index);
    const firstIndex = seen.get(id);
    if (firstIndex !== undefined) {
      duplicates++;
      errors.push({
        topicId: id,
        index,
        field: "id",
        message: `Duplicate topic ID "${id}" (first seen at index ${firstIndex}, duplicate at index ${index})`,
        type: "duplicate",
      });
      rejected.push({ id, index, reason: "duplicate", source: item });
      return;
    }
    seen.set(id, index);

    entries.push(Object.freeze({ id, index, topic: Object.freeze(parsed.data), source: item }));
  });

  const stats = { total: items.length, loaded: entries.length, invalid, duplicates };

  if (mode === "strict" && errors.length > 0) {
    return { success: false, entries: [], rejected, errors, stats };
  }

  return { success: true, entries, rejected, errors, stats };
}

/**
 * Load and validate topics, throwing on error.
 *
 * @throws TopicLoadError if validation fails
 */
export function loadTopicsOrThrow(
  input: unknown,
  options: LoadTopicsOptions = {}
): TopicEntry[] {
  const result = loadTopics(input, options);

  if (!result.success) {
    throw new TopicLoadError(
      `Topic validation failed: ${result.errors.length} error(s)`,
      result.errors
    );
  }

  return result.entries;
}

/**
 * Read a topics JSON file and load it.
 *
 * @throws TopicLoadError if the file is missing or is not valid JSON
 */
export function readTopicsFile(
  filePath: string,
  options: LoadTopicsOptions = {}
): TopicLoadResult {
  if (!existsSync(filePath)) {
    throw new TopicLoadError(`Missing topics file at: ${filePath}`, [
      { field: "(file)", message: `No file at ${filePath}`, type: "file" },
    ]);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new TopicLoadError(`Topics file is not valid JSON: ${filePath}`, [
      { field: "(file)", message: String(err), type: "file" },
    ]);
  }

  return loadTopics(data, options);
}

/**
 * Format a validation report.
 */
export function formatLoadReport(result: TopicLoadResult): string {
  const lines: string[] = [];

  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push(" Topic Load Report");
  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push("");
  lines.push(`Total Topics:  ${result.stats.total}`);
  lines.push(`Loaded:        ${result.stats.loaded}`);
  lines.push(`Invalid:       ${result.stats.invalid}`);
  lines.push(`Duplicates:    ${result.stats.duplicates}`);

  if (result.errors.length > 0) {
    lines.push("");
    lines.push("───────────────────────────────────────────────────────────────");
    lines.push(" ERRORS");
    lines.push("───────────────────────────────────────────────────────────────");

    for (const error of result.errors) {
      lines.push("");
      lines.push(`${issueLocation(error)} ${error.type.toUpperCase()}`);
      lines.push(`  Field: ${error.field}`);
      lines.push(`  Message: ${error.message}`);
    }
  }

  lines.push("");
  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push(result.success ? " ✓ Load PASSED" : " ✗ Load FAILED");
  lines.push("═══════════════════════════════════════════════════════════════");

  return lines.join("\n");
}
