/**
 * Browse CLI Tests
 *
 * Run with: node --import tsx --test src/cli/browse.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { browseTopics } from "./browse.js";
import { loadTopics, loadTopicsOrThrow } from "../topics/loader.js";
import { SAFETY_BANNER, SAFETY_FOOTER, NO_MATCHES_MESSAGE } from "../render/topic-view.js";

const ENTRIES = loadTopicsOrThrow([
  { title: "Asthma", category: "Post-Diagnosis Companion", oneMinuteSummary: "Airways narrow." },
  { title: "Heartburn", category: "Everyday Symptoms", oneMinuteSummary: "A burning feeling." },
]);

describe("browseTopics", () => {
  it("wraps the list in the safety banner and footer", () => {
    const lines = browseTopics(ENTRIES, { search: "asthma" });

    assert.ok(lines);
    assert.equal(lines[0], SAFETY_BANNER);
    assert.equal(lines[lines.length - 1], SAFETY_FOOTER);
    assert.equal(lines[2], "Explore topics (1 topics)");
  });

  it("shows the no-match message", () => {
    const lines = browseTopics(ENTRIES, { category: "Everyday Symptoms", search: "airways" });

    assert.ok(lines);
    assert.equal(lines[2], NO_MATCHES_MESSAGE);
  });

  it("renders a single topic by id", () => {
    const lines = browseTopics(ENTRIES, { topicId: "heartburn", devMode: true });

    assert.ok(lines);
    assert.equal(lines[2], "# Heartburn");
    assert.equal(lines[4], "No safety/style warnings detected.");
  });

  it("lists topics with loose metadata", () => {
    const loaded = loadTopics(
      [{ title: "Flu", category: "Seasonal", lastReviewed: "May 2024" }],
      { mode: "lenient" }
    );
    const lines = browseTopics(loaded.entries, {});

    assert.ok(lines);
    assert.equal(lines[2], "Explore topics (1 topics)");
    assert.equal(lines[4], "Flu  (flu)");
  });

  it("returns undefined for an unknown id", () => {
    assert.equal(browseTopics(ENTRIES, { topicId: "nope" }), undefined);
  });
});
