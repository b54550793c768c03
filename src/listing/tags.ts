import type { ListingTags, TagSet } from "../types";

const NON_WORD = /[^\p{L}\p{N}_]+/gu;

/** Lowercase and drop every character that is not a letter, digit or "_" */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(NON_WORD, "");
}

/**
 * Return the tags (normalized, without leading "#") whose keyword occurs in
 * the text. Punctuation and spacing are ignored on both sides, so
 * "walk-in closet" matches "Walk in closet". Output follows tag order.
 */
export function detectTags(text: string, tags: readonly string[]): string[] {
  const haystack = normalizeText(text);
  const found: string[] = [];
  for (const tag of tags) {
    const keyword = normalizeText(tag.replace(/^#+/, ""));
    if (keyword && haystack.includes(keyword)) {
      found.push(keyword);
    }
  }
  return found;
}

/** Match a description against every tag category */
export function classifyListing(description: string, tagSet: TagSet): ListingTags {
  return {
    features: detectTags(description, [
      ...tagSet.room_feature_tags,
      ...tagSet.unique_feature_tags,
    ]),
    styles: detectTags(description, tagSet.architectural_style_tags),
  };
}
