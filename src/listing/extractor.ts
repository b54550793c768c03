import * as cheerio from "cheerio";
import { UNKNOWN_ADDRESS } from "../config";
import type { ListingRecord } from "../types";

/** Dollar sign followed by digits and thousands separators, e.g. "$1,250,000" */
const PRICE_PATTERN = /\$[\d,]+/;

export interface ListingExtractor {
  extract(markup: string): ListingRecord;
}

/**
 * Reads address, price and description from listing page HTML.
 * Every field falls back to its default when it cannot be found.
 */
export class CheerioListingExtractor implements ListingExtractor {
  extract(markup: string): ListingRecord {
    const $ = cheerio.load(markup);

    let address = UNKNOWN_ADDRESS;
    const title = $("title").first().text().trim();
    if (title) address = title;
    const ogTitle = metaContent($, "og:title");
    if (ogTitle) address = ogTitle;

    return Object.freeze({
      address,
      price: findPriceText($) ?? "",
      description: metaContent($, "og:description") ?? "",
    });
  }
}

function metaContent($: cheerio.CheerioAPI, property: string): string | null {
  const content = $(`meta[property="${property}"]`).first().attr("content")?.trim();
  return content ? content : null;
}

/**
 * First text node, in document order, that contains a price.
 * Returns the whole node text trimmed.
 */
function findPriceText($: cheerio.CheerioAPI): string | null {
  const roots = $.root().contents().toArray();
  type DomNode = (typeof roots)[number];

  const visit = (nodes: DomNode[]): string | null => {
    for (const node of nodes) {
      if ("children" in node) {
        const hit = visit(node.children);
        if (hit !== null) return hit;
      } else if ("data" in node && PRICE_PATTERN.test(node.data)) {
        return node.data.trim();
      }
    }
    return null;
  };

  return visit(roots);
}
