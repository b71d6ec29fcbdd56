/**
 * Content tree utilities.
 */

export {
  extractStrings,
  classifyNode,
  type ContentNode,
  type ContentNodeKind,
} from "./extract.js";

export { normalizeText, stripWhitespace, splitWords } from "./text.js";
