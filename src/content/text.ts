/**
 * Whitespace handling shared by search and the safety scanner.
 *
 * Whitespace here is the Unicode White_Space set plus the ASCII
 * separators U+001C..U+001F. That adds NEL (U+0085) and the separators to
 * what `\s` matches, and leaves out the byte order mark (U+FEFF).
 */

const WHITESPACE_CLASS =
  "\\t-\\r\\u001c-\\u0020\\u0085\\u00a0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000";

const WHITESPACE_RUN = new RegExp(`[${WHITESPACE_CLASS}]+`, "g");
const EDGE_WHITESPACE = new RegExp(`^[${WHITESPACE_CLASS}]+|[${WHITESPACE_CLASS}]+$`, "g");

/**
 * Remove leading and trailing whitespace.
 */
export function stripWhitespace(text: string): string {
  return text.replace(EDGE_WHITESPACE, "");
}

/**
 * Collapse whitespace runs to one space, trim, lowercase.
 *
 * @example
 *   normalizeText("  Stop\tTaking  It ");  // "stop taking it"
 */
export function normalizeText(text: string | null | undefined): string {
  return stripWhitespace((text ?? "").replace(WHITESPACE_RUN, " ")).toLowerCase();
}

/**
 * Words separated by whitespace runs. Blank text has no words.
 */
export function splitWords(text: string): string[] {
  return text.split(WHITESPACE_RUN).filter((word) => word !== "");
}
