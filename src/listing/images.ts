import * as cheerio from "cheerio";
import * as path from "path";

/** Substrings marking previews, video posters and virtual-tour frames */
const SKIP_TOKENS = ["thumb", "small", "video", "tour", "360"];

const SKIP_EXTENSIONS = new Set([".mp4", ".mov", ".webm", ".gif"]);

/**
 * Lowercased file extension of a URL's path, ignoring query and fragment.
 * Returns "" when the path has none.
 */
export function urlExtension(url: string): string {
  try {
    return path.posix.extname(new URL(url).pathname).toLowerCase();
  } catch {
    return "";
  }
}

/**
 * Collect full-size image URLs from listing HTML.
 * Lazy-load `data-src` wins over `src`; relative URLs are resolved against
 * the page URL. Returned in first-seen order without duplicates.
 * @param html - Listing page markup
 * @param pageUrl - URL the markup was fetched from
 */
export function findImageUrls(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const urls = new Set<string>();

  $("img").each((_, el) => {
    const $el = $(el);
    const src = $el.attr("data-src")?.trim() || $el.attr("src")?.trim();
    if (!src) return;

    const lower = src.toLowerCase();
    if (SKIP_TOKENS.some((token) => lower.includes(token))) return;

    let absolute: URL;
    try {
      absolute = new URL(src, pageUrl);
    } catch {
      return;
    }
    if (absolute.protocol !== "http:" && absolute.protocol !== "https:") return;
    if (SKIP_EXTENSIONS.has(urlExtension(absolute.href))) return;

    urls.add(absolute.href);
  });

  return [...urls];
}
