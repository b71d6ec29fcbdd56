/**
 * Text extraction over nested content.
 *
 * A topic is a tree of text, lists and records. The scanner needs every
 * piece of text in it, wherever it sits, so extraction is a plain
 * structural fold: it knows nothing about field names, and a string
 * buried three records deep is reached the same way as a title.
 */

/**
 * A content node after classification.
 * Anything that is not text, a list or a record is "other" and holds no text.
 */
export type ContentNode =
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "list"; readonly items: readonly unknown[] }
  | { readonly kind: "record"; readonly values: readonly unknown[] }
  | { readonly kind: "other" };

export type ContentNodeKind = ContentNode["kind"];

/**
 * Classify a raw value as a content node.
 *
 * Records are plain objects and Maps; their values are taken in iteration
 * order and their keys are dropped.
 */
export function classifyNode(value: unknown): ContentNode {
  if (typeof value === "string") {
    return { kind: "text", value };
  }
  if (Array.isArray(value)) {
    return { kind: "list", items: value };
  }
  if (value instanceof Map) {
    return { kind: "record", values: [...value.values()] };
  }
  if (typeof value === "object" && value !== null) {
    return { kind: "record", values: Object.values(value) };
  }
  return { kind: "other" };
}

function collect(value: unknown, out: string[]): void {
  const node = classifyNode(value);
  switch (node.kind) {
    case "text":
      out.push(node.value);
      return;
    case "list":
      for (const item of node.items) {
        collect(item, out);
      }
      return;
    case "record":
      for (const child of node.values) {
        collect(child, out);
      }
      return;
    case "other":
      return;
  }
}

/**
 * Every string leaf of a content tree, depth-first, in natural order.
 *
 * @example
 *   extractStrings({ title: "Asthma", notes: ["a", { more: "b" }], reviewed: 2024 });
 *   // => ["Asthma", "a", "b"]
 */
export function extractStrings(node: unknown): string[] {
  const out: string[] = [];
  collect(node, out);
  return out;
}
