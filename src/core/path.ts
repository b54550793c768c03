import * as path from "path";

const RESERVED_CHARS = /[\\/:*?<>|]/g;
const MAX_SEGMENT_LENGTH = 100;

/**
 * Turn arbitrary text into a single filesystem-safe path segment.
 * Reserved characters become "_", whitespace runs collapse to one "_",
 * and the result is cut to 100 characters. "." and ".." become "_".
 */
export function sanitize(text: string): string {
  const cleaned = text.replace(RESERVED_CHARS, "_").trim().replace(/\s+/g, "_");
  // Count code points so a surrogate pair is never split.
  const segment = Array.from(cleaned).slice(0, MAX_SEGMENT_LENGTH).join("");
  return segment === "." || segment === ".." ? "_" : segment;
}

/**
 * Folder for a listing's images: base dir, then the sanitized address,
 * then one level per detected tag (feature tags before style tags).
 */
export function buildTargetPath(
  baseDir: string,
  address: string,
  featureTags: string[],
  styleTags: string[]
): string {
  const segments = [sanitize(address), ...featureTags, ...styleTags].filter(
    (segment) => segment !== ""
  );
  return path.join(baseDir, ...segments);
}
