import * as cheerio from "cheerio";
import type { Page } from "../types";

/** MediaWiki's main content container */
export const CONTENT_SELECTOR = "div.mw-parser-output";

/** Tag that opens (and ends) a top-level section */
export const SECTION_HEADING_TAG = "h2";

/** Top-level table-of-contents entry and its display-text child */
export const TOC_ENTRY_SELECTOR = ".toclevel-1";
export const TOC_TEXT_SELECTOR = ".toctext";

/**
 * Parse fetched HTML into a page the extractors can read
 */
export function loadPage(html: string): Page {
    return cheerio.load(html);
}
