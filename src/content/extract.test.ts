/**
 * Text Extractor Tests
 *
 * Run with: node --import tsx --test src/content/extract.test.ts
 *
 * These tests verify:
 *   1. Type dispatch: text, list, record, everything else
 *   2. Depth-first order over nested content
 *   3. Keys are never extracted and input is never modified
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { extractStrings, classifyNode } from "./extract.js";

// ═══════════════════════════════════════════════════════════════════════════
// TYPE DISPATCH
// ═══════════════════════════════════════════════════════════════════════════

describe("classifyNode", () => {
  it("classifies each kind of value", () => {
    assert.equal(classifyNode("x").kind, "text");
    assert.equal(classifyNode(["x"]).kind, "list");
    assert.equal(classifyNode({ a: "x" }).kind, "record");
    assert.equal(classifyNode(new Map([["a", "x"]])).kind, "record");
    assert.equal(classifyNode(5).kind, "other");
    assert.equal(classifyNode(true).kind, "other");
    assert.equal(classifyNode(null).kind, "other");
    assert.equal(classifyNode(undefined).kind, "other");
  });
});

describe("extractStrings", () => {
  it("returns a single text node as one element", () => {
    assert.deepEqual(extractStrings("hello"), ["hello"]);
  });

  it("keeps empty strings", () => {
    assert.deepEqual(extractStrings(["", "a"]), ["", "a"]);
  });

  it("returns nothing for non-text scalars", () => {
    assert.deepEqual(extractStrings(42), []);
    assert.deepEqual(extractStrings(false), []);
    assert.deepEqual(extractStrings(null), []);
    assert.deepEqual(extractStrings(undefined), []);
  });

  it("flattens nested lists in order", () => {
    assert.deepEqual(extractStrings(["a", ["b", ["c"]], 3, "d"]), ["a", "b", "c", "d"]);
  });

  it("takes record values in field order and skips keys", () => {
    const strings = extractStrings({ first: "x", second: { third: "y" }, count: 1 });
    assert.deepEqual(strings, ["x", "y"]);
    assert.ok(!strings.includes("first"));
  });

  it("takes Map values in insertion order", () => {
    const node = new Map<string, unknown>([
      ["k", "v"],
      ["k2", ["w"]],
    ]);
    assert.deepEqual(extractStrings(node), ["v", "w"]);
  });

  it("walks depth-first across mixed nesting", () => {
    const topic = {
      title: "T",
      sections: [{ heading: "H1", body: ["p1", "p2"] }, { heading: "H2" }],
      tail: "end",
    };
    assert.deepEqual(extractStrings(topic), ["T", "H1", "p1", "p2", "H2", "end"]);
  });

  it("reaches text nested in extraDetail", () => {
    const topic = {
      title: "Clean",
      extraDetail: { generalSelfCare: ["nested one", { deeper: "nested two" }] },
    };
    assert.deepEqual(extractStrings(topic), ["Clean", "nested one", "nested two"]);
  });

  it("returns every leaf exactly once, duplicates included", () => {
    assert.deepEqual(extractStrings(["same", { again: "same" }]), ["same", "same"]);
  });

  it("is deterministic and leaves the input untouched", () => {
    const topic = Object.freeze({
      title: "Frozen",
      list: Object.freeze(["a", "b"]),
    });
    const before = JSON.stringify(topic);

    const first = extractStrings(topic);
    const second = extractStrings(topic);

    assert.deepEqual(first, second);
    assert.equal(JSON.stringify(topic), before);
  });
});
