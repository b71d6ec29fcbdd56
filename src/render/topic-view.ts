/**
 * Plain-text rendering of topics for the terminal.
 *
 * Every function returns lines and prints nothing, so the CLIs decide
 * where output goes and tests can compare lines directly.
 *
 * The developer panel scans the topic on every render. Results are not
 * cached: an edited topics file shows fresh warnings on the next run.
 */

import { resolveImage } from "../assets/resolver.js";
import { DEFAULT_SAFETY_POLICY } from "../config/safety/defaults.js";
import type { SafetyPolicy } from "../config/safety/schema.js";
import { scanTopic, formatWarning, type SafetyWarning } from "../safety/scanner.js";
import type { TopicEntry } from "../topics/loader.js";
import type { ExtraDetail, ExtraDetailSection } from "../topics/schema.js";

export const SAFETY_BANNER =
  "Education only. Not medical advice. This tool does not diagnose, assess urgency, or provide treatment instructions.";

export const SAFETY_FOOTER =
  "Education only: not diagnosis, not urgency guidance, not treatment instructions. " +
  "If you're worried about a symptom, use professional care and bring questions to a clinician.";

export const NO_MATCHES_MESSAGE = "No topics match your search. Try a shorter keyword.";

export const DEFAULT_DEV_WARNING_LIMIT = 8;

export interface RenderTopicOptions {
  /** Show the ELI5 summary */
  eli5?: boolean;
  /** Show extra-detail captions under each section */
  extraDetail?: boolean;
  /** Show the developer safety panel */
  devMode?: boolean;
  /** Directory visuals resolve against */
  imagesDir?: string;
  /** Warnings shown in the developer panel */
  devWarningLimit?: number;
  policy?: Readonly<SafetyPolicy>;
}

/**
 * Developer panel for a scan result: first `limit` warnings in scan order.
 */
export function renderDevPanel(
  warnings: readonly SafetyWarning[],
  limit: number = DEFAULT_DEV_WARNING_LIMIT
): string[] {
  if (warnings.length === 0) {
    return ["No safety/style warnings detected."];
  }
  return [
    "Safety/style warnings detected (dev only):",
    ...warnings.slice(0, limit).map((w) => `- ${formatWarning(w)}`),
  ];
}

/**
 * Summary card for the topic list.
 */
export function renderTopicCard(entry: TopicEntry): string[] {
  const { topic } = entry;
  const pills = [topic.category, "~60 seconds"]
    .filter((pill): pill is string => pill !== undefined && pill !== "")
    .map((pill) => `[${pill}]`)
    .join(" ");

  const lines = [`${topic.title}  (${entry.id})`];
  if (topic.oneMinuteSummary) {
    lines.push(`  ${topic.oneMinuteSummary}`);
  }
  lines.push(`  ${pills}`);
  return lines;
}

/**
 * Topic list with a count header, or the no-match message.
 */
export function renderTopicList(entries: readonly TopicEntry[]): string[] {
  if (entries.length === 0) {
    return [NO_MATCHES_MESSAGE];
  }

  const lines = [`Explore topics (${entries.length} topics)`];
  for (const entry of entries) {
    lines.push("", ...renderTopicCard(entry));
  }
  return lines;
}

function bullets(items: readonly string[]): string[] {
  return items.map((item) => `- ${item}`);
}

function detailLines(
  extraDetail: ExtraDetail,
  section: ExtraDetailSection,
  enabled: boolean
): string[] {
  const detail = extraDetail[section];
  if (!enabled || detail === undefined || detail.length === 0) {
    return [];
  }
  const paragraphs = typeof detail === "string" ? [detail] : detail;
  return paragraphs.map((text) => `  > ${text}`);
}

/**
 * Full topic body, sections in reading order.
 */
export function renderTopic(entry: TopicEntry, options: RenderTopicOptions = {}): string[] {
  const {
    eli5 = true,
    extraDetail = false,
    devMode = false,
    imagesDir = "assets/images",
    devWarningLimit = DEFAULT_DEV_WARNING_LIMIT,
    policy = DEFAULT_SAFETY_POLICY,
  } = options;
  const { topic } = entry;
  const detail = topic.extraDetail;

  const sections: string[][] = [];

  sections.push([`# ${topic.title}`]);

  if (devMode) {
    sections.push(renderDevPanel(scanTopic(entry.source, policy), devWarningLimit));
  }

  sections.push([
    "## One-Minute Summary",
    topic.oneMinuteSummary,
    ...detailLines(detail, "oneMinuteSummary", extraDetail),
  ]);

  if (eli5) {
    sections.push(["## ELI5 Summary", topic.eli5Summary]);
  }

  sections.push([
    "## What's happening in your body",
    ...bullets(topic.whatsHappening),
    ...detailLines(detail, "whatsHappening", extraDetail),
  ]);

  const analogy = ["## Analogy"];
  if (topic.analogy) {
    analogy.push(
      topic.analogy.title,
      topic.analogy.story,
      ...detailLines(detail, "analogy", extraDetail)
    );
  }
  sections.push(analogy);

  sections.push([
    "## People often notice",
    ...bullets(topic.peopleOftenNotice),
    ...detailLines(detail, "peopleOftenNotice", extraDetail),
  ]);

  sections.push([
    "## General self-care education",
    "(Non-prescriptive, no meds, no urgency guidance.)",
    ...bullets(topic.generalSelfCare),
    ...detailLines(detail, "generalSelfCare", extraDetail),
  ]);

  if (topic.category === "Post-Diagnosis Companion" && topic.questionsForClinician.length > 0) {
    sections.push([
      "## Questions for your clinician",
      ...bullets(topic.questionsForClinician),
      ...detailLines(detail, "questionsForClinician", extraDetail),
    ]);
  }

  sections.push(["## Visual", ...renderVisual(entry, imagesDir)]);

  const video = topic.videos[0];
  if (video && video.embedUrl !== "") {
    sections.push(["## Video (optional)", "Educational resource.", video.embedUrl]);
  }

  sections.push([
    "## Resources",
    ...(topic.resources.length > 0
      ? topic.resources.map((r) => (r.url ? `- ${r.label}: ${r.url}` : `- ${r.label}`))
      : ["No resources yet."]),
  ]);

  sections.push([`Last reviewed: ${topic.lastReviewed ?? "—"}`]);

  return sections.flatMap((section, i) => (i === 0 ? section : ["", ...section]));
}

function renderVisual(entry: TopicEntry, imagesDir: string): string[] {
  const visual = entry.topic.visuals[0];
  if (!visual) {
    return ["No visual added yet for this topic."];
  }

  const asset = resolveImage(visual.src, imagesDir);
  if (asset.status === "missing") {
    return [`(Visual missing) Add file: ${asset.path}`];
  }
  return [visual.alt ? `[image] ${asset.path} (${visual.alt})` : `[image] ${asset.path}`];
}
