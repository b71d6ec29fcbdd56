/**
 * Topic asset resolution.
 *
 * Topics reference visuals by logical path ("/images/bp-diagram.svg").
 * The resolver maps that onto the local images directory and reports a
 * missing file as a status, never as an error, so a topic without its
 * visual still renders.
 */

import { existsSync, statSync } from "node:fs";
import { join } from "node:path";

export type ResolvedAsset =
  | { readonly status: "found"; readonly path: string }
  | { readonly status: "missing"; readonly path: string };

/**
 * File name of an image relative to the images directory:
 * every "/images/" segment removed, leading slashes stripped.
 */
export function imageFileName(src: string): string {
  return src.replaceAll("/images/", "").replace(/^\/+/, "");
}

/**
 * Resolve a visual's logical path against the images directory.
 *
 * @example
 *   resolveImage("/images/bp-diagram.svg", "assets/images");
 *   // => { status: "found", path: "assets/images/bp-diagram.svg" }
 */
export function resolveImage(src: string, imagesDir: string): ResolvedAsset {
  const path = join(imagesDir, imageFileName(src));
  const found = existsSync(path) && statSync(path).isFile();
  return found ? { status: "found", path } : { status: "missing", path };
}
