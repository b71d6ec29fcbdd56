/**
 * Topic search and category filtering.
 *
 * Search is a plain substring match over the title and both summaries,
 * after whitespace is collapsed and case is folded. Filters are
 * AND-combined and keep the dataset order.
 */

import { normalizeText } from "../content/index.js";
import type { Topic, CategoryFilter } from "./schema.js";
import type { TopicEntry } from "./loader.js";

export interface TopicFilter {
  /** Category to keep; "All" or absent keeps every category */
  category?: CategoryFilter;
  /** Free-text query; empty or absent matches everything */
  query?: string;
}

/**
 * Whether a topic matches a free-text query.
 */
export function matchesSearch(
  topic: Pick<Topic, "title" | "oneMinuteSummary" | "eli5Summary">,
  query: string | undefined
): boolean {
  if (!query) {
    return true;
  }
  const needle = normalizeText(query);
  const haystack = [topic.title, topic.oneMinuteSummary, topic.eli5Summary].join(" ");
  return normalizeText(haystack).includes(needle);
}

export function matchesCategory(
  topic: Pick<Topic, "category">,
  category: CategoryFilter | undefined
): boolean {
  return category === undefined || category === "All" || topic.category === category;
}

/**
 * Entries matching the filter, in their original order.
 *
 * @example
 *   filterTopics(entries, { category: "Everyday Symptoms", query: "headache" });
 */
export function filterTopics(
  entries: readonly TopicEntry[],
  filter: TopicFilter = {}
): TopicEntry[] {
  return entries.filter(
    (entry) =>
      matchesCategory(entry.topic, filter.category) && matchesSearch(entry.topic, filter.query)
  );
}

/**
 * Parse a user-supplied category name, case-insensitively.
 * Returns undefined for an unknown name.
 */
export function parseCategoryFilter(
  value: string | undefined,
  filters: readonly CategoryFilter[]
): CategoryFilter | undefined {
  if (value === undefined) return "All";
  const wanted = normalizeText(value);
  return filters.find((filter) => normalizeText(filter) === wanted);
}
