/**
 * Content Safety Scanner
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EDUCATION ONLY, NEVER PRESCRIPTIVE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Topics explain what is happening in the body. They must not read as a
 * diagnosis, urgency advice or a medication instruction. The scanner is the
 * last check on authored text before it is shown, and it flags two things:
 *
 *   1. BANNED PHRASE: normalized text contains an entry of the phrase table
 *      ("you should take", "stop taking", "diagnosis:" ...)
 *   2. LONG SENTENCE: a sentence runs past the word limit (25 by default)
 *
 * Each extracted string yields at most one warning per check:
 *   - the FIRST phrase in table order wins, later phrases are not reported
 *   - the FIRST long sentence wins, later ones are not reported
 *
 * Matching is plain substring containment over normalized text. It is not
 * word-aware, so "take " also fires inside "intake ". Known heuristic.
 *
 * Warnings are advisory. Nothing here blocks rendering, and the topic is
 * never modified: a scan is a pure function of (topic, policy).
 *
 * USAGE:
 *   const warnings = scanTopic(topic);
 *   for (const w of warnings.slice(0, 8)) {
 *     console.log(formatWarning(w));
 *   }
 */

import { extractStrings, normalizeText, splitWords, stripWhitespace } from "../content/index.js";
import { DEFAULT_SAFETY_POLICY } from "../config/safety/defaults.js";
import type { SafetyPolicy } from "../config/safety/schema.js";

/**
 * Warning kinds for programmatic handling.
 */
export type SafetyWarningKind = "banned_phrase" | "long_sentence";

/**
 * Text contained a phrase from the banned phrase table.
 */
export interface BannedPhraseWarning {
  readonly kind: "banned_phrase";
  /** Table entry that matched */
  readonly phrase: string;
  /** Start of the original string, suffix always appended */
  readonly excerpt: string;
}

/**
 * A sentence ran past the word limit.
 */
export interface LongSentenceWarning {
  readonly kind: "long_sentence";
  readonly wordCount: number;
  /** Start of the trimmed sentence, suffix always appended */
  readonly excerpt: string;
}

export type SafetyWarning = BannedPhraseWarning | LongSentenceWarning;

/**
 * Quote the start of a text for a warning.
 *
 * Counts code points, not UTF-16 units, so an emoji is never cut in half.
 * The suffix is appended even when nothing was cut.
 */
export function makeExcerpt(
  text: string,
  policy: Pick<SafetyPolicy, "excerptLength" | "excerptSuffix"> = DEFAULT_SAFETY_POLICY
): string {
  return Array.from(text).slice(0, policy.excerptLength).join("") + policy.excerptSuffix;
}

/**
 * Split text into candidate sentences on ".", "!" and "?".
 * Segments are trimmed and empty ones dropped.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]/)
    .map((segment) => stripWhitespace(segment))
    .filter((segment) => segment.length > 0);
}

export function countWords(sentence: string): number {
  return splitWords(sentence).length;
}

/**
 * First table phrase contained in the text, in table order.
 */
export function findBannedPhrase(
  text: string,
  policy: Pick<SafetyPolicy, "bannedPhrases"> = DEFAULT_SAFETY_POLICY
): string | undefined {
  const normalized = normalizeText(text);
  return policy.bannedPhrases.find((phrase) => normalized.includes(phrase));
}

/**
 * First sentence over the word limit, with its word count.
 */
export function findLongSentence(
  text: string,
  policy: Pick<SafetyPolicy, "maxSentenceWords"> = DEFAULT_SAFETY_POLICY
): { sentence: string; wordCount: number } | undefined {
  for (const sentence of splitSentences(text)) {
    const wordCount = countWords(sentence);
    if (wordCount > policy.maxSentenceWords) {
      return { sentence, wordCount };
    }
  }
  return undefined;
}

/**
 * Scan a single string. Returns 0, 1 or 2 warnings, banned phrase first.
 */
export function scanText(
  text: string,
  policy: Readonly<SafetyPolicy> = DEFAULT_SAFETY_POLICY
): SafetyWarning[] {
  const warnings: SafetyWarning[] = [];

  const phrase = findBannedPhrase(text, policy);
  if (phrase !== undefined) {
    warnings.push({ kind: "banned_phrase", phrase, excerpt: makeExcerpt(text, policy) });
  }

  const long = findLongSentence(text, policy);
  if (long !== undefined) {
    warnings.push({
      kind: "long_sentence",
      wordCount: long.wordCount,
      excerpt: makeExcerpt(long.sentence, policy),
    });
  }

  return warnings;
}

/**
 * Scan every string in a topic, in extraction order.
 *
 * @param topic - Topic record as authored (any JSON-like tree)
 * @param policy - Phrase table and limits; defaults to DEFAULT_SAFETY_POLICY
 */
export function scanTopic(
  topic: unknown,
  policy: Readonly<SafetyPolicy> = DEFAULT_SAFETY_POLICY
): SafetyWarning[] {
  return extractStrings(topic).flatMap((text) => scanText(text, policy));
}

/**
 * Developer-facing display string for a warning.
 */
export function formatWarning(warning: SafetyWarning): string {
  switch (warning.kind) {
    case "banned_phrase":
      return `Banned phrase "${warning.phrase}" found in: ${warning.excerpt}`;
    case "long_sentence":
      return `Long sentence (${warning.wordCount} words): ${warning.excerpt}`;
  }
}
