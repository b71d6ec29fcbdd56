/**
 * Topic dataset module.
 *
 * Topics flow through the system as follows:
 *
 * 1. LOADING: readTopicsFile() / loadTopics() validate each record against
 *    TopicSchema, derive ids, and reject duplicates.
 *
 * 2. BROWSING: filterTopics() narrows entries by category and free-text
 *    query, keeping dataset order.
 *
 * 3. SCANNING: each entry keeps its authored `source` record, which is what
 *    the safety scanner reads.
 *
 *   import { readTopicsFile, filterTopics } from "./topics/index.js";
 *   import { scanTopic } from "./safety/index.js";
 *
 *   const { entries } = readTopicsFile("topics/sample-topics.json", { mode: "lenient" });
 *   for (const entry of filterTopics(entries, { query: "asthma" })) {
 *     const warnings = scanTopic(entry.source);
 *   }
 */

export {
  TopicSchema,
  TopicCollectionSchema,
  TopicCategory,
  AnalogySchema,
  ExtraDetailSchema,
  VisualSchema,
  VideoSchema,
  ResourceSchema,
  CATEGORY_FILTERS,
  UNTITLED,
  type Topic,
  type TopicCollection,
  type CategoryFilter,
  type Analogy,
  type ExtraDetail,
  type ExtraDetailSection,
  type Visual,
  type Video,
  type Resource,
} from "./schema.js";

export {
  loadTopics,
  loadTopicsOrThrow,
  readTopicsFile,
  formatLoadReport,
  topicIdFor,
  slugify,
  authoredTitle,
  displayTitle,
  TopicLoadError,
  type TopicEntry,
  type RejectedTopic,
  type TopicIssue,
  type TopicLoadResult,
  type LoadTopicsOptions,
} from "./loader.js";

export {
  matchesSearch,
  matchesCategory,
  filterTopics,
  parseCategoryFilter,
  type TopicFilter,
} from "./search.js";
