import type { TestInfo } from "../types";

export const WIKI_BASE_URL = "https://artofproblemsolving.com/wiki/index.php";

const ANSWER_KEY_SUFFIX = "_Answer_Key";
const PROBLEMS_SUFFIX = "_Problems";

/**
 * Build the answer key URL for a test, e.g. ".../2019_AMC_10A_Answer_Key"
 */
export function buildAnswerKeyUrl(
    year: number | string,
    test: Pick<TestInfo, "urlFormat">,
    baseUrl: string = WIKI_BASE_URL
): string {
    const base = baseUrl.replace(/\/+$/, "");
    return `${base}/${year}_${test.urlFormat}${ANSWER_KEY_SUFFIX}`;
}

/**
 * Derive a question's problem page from its test's answer key URL
 */
export function buildProblemUrl(answerKeyUrl: string, question: number): string {
    return `${answerKeyUrl.replace(ANSWER_KEY_SUFFIX, PROBLEMS_SUFFIX)}/Problem_${question}`;
}
