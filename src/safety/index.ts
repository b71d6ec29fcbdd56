/**
 * Content safety scanning.
 */

export {
  scanTopic,
  scanText,
  formatWarning,
  findBannedPhrase,
  findLongSentence,
  makeExcerpt,
  splitSentences,
  countWords,
  type SafetyWarning,
  type SafetyWarningKind,
  type BannedPhraseWarning,
  type LongSentenceWarning,
} from "./scanner.js";
