/**
 * Default safety policy.
 *
 * NOTE: the phrase table is matched by plain substring containment, so
 * short entries such as "take " also match inside longer words ("intake ").
 * This is a known coarse heuristic; changing it to word-boundary matching
 * would change which published content gets flagged.
 */

import type { SafetyPolicy } from "./schema.js";

export const DEFAULT_SAFETY_POLICY: Readonly<SafetyPolicy> = Object.freeze({
  bannedPhrases: Object.freeze([
    "you should take",
    "take ",
    "go to the er",
    "don't need a doctor",
    "dont need a doctor",
    "most likely",
    "this means you have",
    "diagnosis:",
    "start taking",
    "stop taking",
    "dose",
    "dosage",
  ]),
  maxSentenceWords: 25,
  excerptLength: 140,
  excerptSuffix: "...",
});
