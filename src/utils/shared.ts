/**
 * Shared utility functions used across the codebase
 */

import { isTag, isText, type AnyNode, type Element, type Text } from "domhandler";

// =============================================================================
// Node utilities
// =============================================================================

/** Type guard for element nodes, script and style included */
export function isElement(node: AnyNode): node is Element {
    return isTag(node);
}

/** Type guard for text nodes (comments and CDATA are not text) */
export function isTextNode(node: AnyNode): node is Text {
    return isText(node);
}

/** Lower-cased tag name, or "" for anything that is not an element */
export function tagNameOf(node: AnyNode): string {
    return isElement(node) ? node.name.toLowerCase() : "";
}

/**
 * Visit every descendant of a node in document order (the node itself excluded)
 */
export function forEachDescendant(node: Element, visit: (descendant: AnyNode) => void): void {
    for (const child of node.children) {
        visit(child);
        if (isElement(child)) {
            forEachDescendant(child, visit);
        }
    }
}
