import type { AnswerList, ContentFragment, SectionTitle, TestInfo } from "../types";
import { hasReadableContent } from "../extraction/sections";

/** Heading line for a test, e.g. "2019 AMC 10A" */
export function testLabel(year: number, test: TestInfo): string {
    return `${year} ${test.description}`;
}

/**
 * Format an answer key as a numbered list
 */
export function formatAnswers(label: string, answers: AnswerList): string {
    const lines: string[] = [];

    lines.push(`Answers for ${label}:`);
    lines.push("-".repeat(50));

    for (let i = 0; i < answers.length; i++) {
        const answer = answers[i];
        if (answer === undefined) continue;
        lines.push(`${String(i + 1).padStart(2)}. ${answer}`);
    }

    return lines.join("\n");
}

/**
 * Format section titles as a 1-based menu
 */
export function formatSections(sections: SectionTitle[]): string {
    return sections.map((title, i) => `${i + 1}. ${title}`).join("\n");
}

/**
 * Join fragments for display: single spaces between fragments, separators
 * included. Returns "" when nothing but separators is present.
 */
export function renderFragments(fragments: ContentFragment[]): string {
    if (!hasReadableContent(fragments)) return "";
    return fragments.join(" ");
}

/**
 * Render fragments as tidy paragraphs: separators become paragraph breaks and
 * spaces around them are dropped
 */
export function renderParagraphs(fragments: ContentFragment[]): string {
    if (!hasReadableContent(fragments)) return "";
    return fragments
        .join(" ")
        .split("\n")
        .map(line => line.trim())
        .filter(line => line.length > 0)
        .join("\n\n");
}
