import type { Element } from "domhandler";
import type { ContentFragment, Page, SectionTitle } from "../types";
import { SEPARATOR } from "../types";
import { latexToText } from "../latex/convert";
import { forEachDescendant, isElement, isTextNode, tagNameOf } from "../utils/shared";
import {
    CONTENT_SELECTOR,
    SECTION_HEADING_TAG,
    TOC_ENTRY_SELECTOR,
    TOC_TEXT_SELECTOR,
} from "./page";

/** Converts the LaTeX alt text of a math image to plain text */
export type MathConverter = (markup: string) => string;

/** Siblings whose descendants contribute text */
const CONTENT_TAGS = new Set(["p", "ul", "ol", "div"]);

/**
 * List the titles of the top-level table-of-contents entries, in document order.
 * Entries without a display-text child are skipped; no table of contents gives [].
 */
export function listSections(page: Page): SectionTitle[] {
    const titles: SectionTitle[] = [];

    page(TOC_ENTRY_SELECTOR).each((_, entry) => {
        const $text = page(entry).find(TOC_TEXT_SELECTOR).first();
        if ($text.length > 0) {
            titles.push($text.text().trim());
        }
    });

    return titles;
}

/**
 * Collect text and converted math from every descendant of a content block
 */
function collectFragments(
    block: Element,
    fragments: ContentFragment[],
    convert: MathConverter
): void {
    forEachDescendant(block, (node) => {
        if (isElement(node) && tagNameOf(node) === "img") {
            const markup = node.attribs["alt"] ?? "";
            fragments.push(convert(markup).replace(/\n+$/, ""));
        } else if (isTextNode(node)) {
            const text = node.data.trim();
            if (text.length > 0) {
                fragments.push(text);
            }
        }
    });
}

/**
 * Extract the text of one section as fragments, with a separator after every
 * sibling node (text and comments included) between the section heading and
 * the next h2.
 *
 * sectionIndex is zero-based over the h2 headings of the content container,
 * not counting the first one (the generated "Contents" heading). Anything out
 * of range gives [].
 */
export function extractSection(
    page: Page,
    sectionIndex: number,
    convert: MathConverter = latexToText
): ContentFragment[] {
    const $container = page(CONTENT_SELECTOR).first();
    if ($container.length === 0) return [];

    const headings = $container.find(SECTION_HEADING_TAG).toArray().slice(1);
    if (!Number.isInteger(sectionIndex) || sectionIndex < 0) return [];

    const anchor = headings[sectionIndex];
    if (anchor === undefined) return [];

    const fragments: ContentFragment[] = [];

    for (let sibling = anchor.next; sibling !== null; sibling = sibling.next) {
        const tag = tagNameOf(sibling);
        if (tag === SECTION_HEADING_TAG) break;

        if (isElement(sibling) && CONTENT_TAGS.has(tag)) {
            collectFragments(sibling, fragments, convert);
        }
        fragments.push(SEPARATOR);
    }

    return fragments;
}

/**
 * True when at least one fragment is more than a separator
 */
export function hasReadableContent(fragments: ContentFragment[]): boolean {
    return fragments.some(fragment => fragment !== SEPARATOR);
}
