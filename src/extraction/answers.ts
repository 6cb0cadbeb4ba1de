import type { AnswerList, Page } from "../types";
import { CONTENT_SELECTOR } from "./page";

/**
 * Extract the ordered answer list from an answer key page.
 *
 * Only list items of an ordered list sitting directly in the content container
 * count. Returns null when none hold any text, which callers report as an
 * unrecognized page rather than a fetch failure.
 */
export function extractAnswers(page: Page): AnswerList | null {
    const answers: AnswerList = [];

    page(`${CONTENT_SELECTOR} > ol > li`).each((_, item) => {
        const text = page(item).text().trim();
        if (text.length > 0) {
            answers.push(text);
        }
    });

    return answers.length > 0 ? answers : null;
}
