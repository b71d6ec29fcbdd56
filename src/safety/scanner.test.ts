/**
 * Safety Scanner Tests
 *
 * Run with: node --import tsx --test src/safety/scanner.test.ts
 *
 * These tests verify:
 *   1. Banned phrases: table order, one warning per string, substring semantics
 *   2. Long sentences: the 25/26 word boundary, first sentence only
 *   3. Excerpts: suffix always appended, code-point truncation
 *   4. Topic scans: nested fields reached, discovery order, purity
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import {
  scanText,
  scanTopic,
  formatWarning,
  makeExcerpt,
  splitSentences,
  countWords,
  findBannedPhrase,
} from "./scanner.js";
import { DEFAULT_SAFETY_POLICY } from "../config/safety/defaults.js";
import { loadSafetyPolicy } from "../config/safety/loader.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A sentence of `count` distinct, harmless words: "w0 w1 w2 ...".
 */
function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(" ");
}

// ═══════════════════════════════════════════════════════════════════════════
// BANNED PHRASES
// ═══════════════════════════════════════════════════════════════════════════

describe("banned phrase check", () => {
  it("flags a prescriptive instruction", () => {
    assert.deepEqual(scanText("Start taking this medication twice daily."), [
      {
        kind: "banned_phrase",
        phrase: "start taking",
        excerpt: "Start taking this medication twice daily....",
      },
    ]);
  });

  it("reports only the first table entry when several match", () => {
    const warnings = scanText("You should take a dose now");
    assert.equal(warnings.length, 1);
    assert.deepEqual(warnings[0], {
      kind: "banned_phrase",
      phrase: "you should take",
      excerpt: "You should take a dose now...",
    });
  });

  it("uses table order, not position in the text", () => {
    assert.equal(findBannedPhrase("Check the dosage before you start taking it"), "start taking");
  });

  it("matches inside longer words", () => {
    assert.equal(findBannedPhrase("Fluid intake matters."), "take ");
  });

  it("needs the trailing space of 'take '", () => {
    assert.deepEqual(scanText("Things to take."), []);
  });

  it("matches across collapsed whitespace and case", () => {
    assert.deepEqual(scanText("GO   TO\nTHE ER if worried"), [
      {
        kind: "banned_phrase",
        phrase: "go to the er",
        excerpt: "GO   TO\nTHE ER if worried...",
      },
    ]);
  });

  it("treats NEL as whitespace when matching", () => {
    assert.deepEqual(scanText("Stop\u0085taking it"), [
      { kind: "banned_phrase", phrase: "stop taking", excerpt: "Stop\u0085taking it..." },
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// LONG SENTENCES
// ═══════════════════════════════════════════════════════════════════════════

describe("long sentence check", () => {
  it("allows exactly 25 words", () => {
    assert.deepEqual(scanText(`${words(25)}.`), []);
  });

  it("flags 26 words", () => {
    assert.deepEqual(scanText(`${words(26)}.`), [
      { kind: "long_sentence", wordCount: 26, excerpt: `${words(26)}...` },
    ]);
  });

  it("reports a 30 word sentence with a truncated excerpt", () => {
    const sentence = Array.from({ length: 30 }, () => "alpha").join(" ");
    assert.deepEqual(scanText(sentence), [
      { kind: "long_sentence", wordCount: 30, excerpt: "alpha ".repeat(23) + "al..." },
    ]);
  });

  it("reports only the first long sentence", () => {
    assert.deepEqual(scanText(`${words(26)}. ${words(30)}.`), [
      { kind: "long_sentence", wordCount: 26, excerpt: `${words(26)}...` },
    ]);
  });

  it("skips short sentences and quotes the trimmed one", () => {
    assert.deepEqual(scanText(`Short one.   ${words(27)}!`), [
      { kind: "long_sentence", wordCount: 27, excerpt: `${words(27)}...` },
    ]);
  });

  it("splits on . ! and ? and drops empty segments", () => {
    assert.deepEqual(splitSentences("One. Two!  ?Three"), ["One", "Two", "Three"]);
  });

  it("counts words across whitespace runs", () => {
    assert.equal(countWords("  a  b\tc \n d "), 4);
    assert.equal(countWords("   "), 0);
  });

  it("counts words separated by NEL and the ASCII separators", () => {
    assert.equal(countWords("\u0085a\u001fb\u0085"), 2);

    const sentence = Array.from({ length: 30 }, (_, i) => `w${i}`).join("\u0085");
    assert.deepEqual(scanText(sentence), [
      { kind: "long_sentence", wordCount: 30, excerpt: `${sentence}...` },
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// PER-STRING BEHAVIOUR
// ═══════════════════════════════════════════════════════════════════════════

describe("scanText", () => {
  it("returns nothing for clean text", () => {
    assert.deepEqual(
      scanText("Drink water and rest. Many people feel better after sleep."),
      []
    );
  });

  it("returns both warnings, banned phrase first", () => {
    const body = "care ".repeat(24).trim();
    const text = `You should take ${body}.`;

    assert.deepEqual(scanText(text), [
      { kind: "banned_phrase", phrase: "you should take", excerpt: `${text}...` },
      { kind: "long_sentence", wordCount: 27, excerpt: `You should take ${body}...` },
    ]);
  });

  it("follows a custom policy", () => {
    const policy = loadSafetyPolicy({
      ...DEFAULT_SAFETY_POLICY,
      bannedPhrases: ["Rest"],
      maxSentenceWords: 3,
      excerptLength: 4,
      excerptSuffix: " [cut]",
    });

    assert.deepEqual(scanText("Rest well now please.", policy), [
      { kind: "banned_phrase", phrase: "rest", excerpt: "Rest [cut]" },
      { kind: "long_sentence", wordCount: 4, excerpt: "Rest [cut]" },
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// EXCERPTS AND FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

describe("makeExcerpt", () => {
  it("always appends the suffix", () => {
    assert.equal(makeExcerpt("short"), "short...");
    assert.equal(makeExcerpt(""), "...");
  });

  it("keeps the first 140 characters", () => {
    assert.equal(makeExcerpt("x".repeat(200)), "x".repeat(140) + "...");
  });

  it("counts code points", () => {
    assert.equal(makeExcerpt("😀".repeat(150)), "😀".repeat(140) + "...");
  });
});

describe("formatWarning", () => {
  it("formats a banned phrase warning", () => {
    assert.equal(
      formatWarning({ kind: "banned_phrase", phrase: "dose", excerpt: "Dose note..." }),
      'Banned phrase "dose" found in: Dose note...'
    );
  });

  it("formats a long sentence warning", () => {
    assert.equal(
      formatWarning({ kind: "long_sentence", wordCount: 30, excerpt: "alpha..." }),
      "Long sentence (30 words): alpha..."
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// TOPIC SCANS
// ═══════════════════════════════════════════════════════════════════════════

describe("scanTopic", () => {
  it("flags a banned phrase nested in extraDetail", () => {
    const topic = {
      title: "Clean title",
      generalSelfCare: ["Rest is common."],
      extraDetail: { generalSelfCare: "Stop taking it if it hurts." },
    };

    assert.deepEqual(scanTopic(topic), [
      {
        kind: "banned_phrase",
        phrase: "stop taking",
        excerpt: "Stop taking it if it hurts....",
      },
    ]);
  });

  it("orders warnings by discovery", () => {
    const topic = {
      summary: "This means you have flu.",
      sections: ["fine", `${words(26)}.`],
    };

    assert.deepEqual(
      scanTopic(topic).map((w) => w.kind),
      ["banned_phrase", "long_sentence"]
    );
  });

  it("ignores non-text fields", () => {
    assert.deepEqual(scanTopic({ reviewed: 2024, draft: true, notes: null }), []);
  });

  it("is idempotent and does not modify the topic", () => {
    const topic = {
      title: "Most likely a cold",
      body: [`${words(28)}.`],
    };
    const before = JSON.stringify(topic);

    const first = scanTopic(topic);
    const second = scanTopic(topic);

    assert.equal(first.length, 2);
    assert.deepEqual(first, second);
    assert.equal(JSON.stringify(topic), before);
  });
});
