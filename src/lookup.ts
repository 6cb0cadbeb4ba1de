/**
 * Answer key and solution lookups: URL resolution, fetching and extraction
 */

import type {
    AnswerKeyResult,
    FetchOptions,
    SectionListResult,
    SolutionResult,
    TestInfo,
} from "./types";
import { InvalidTestError } from "./errors";
import { extractAnswers } from "./extraction/answers";
import { extractSection, listSections } from "./extraction/sections";
import { FIRST_TEST_YEAR, availableTests, latestTestYear, resolveTestType } from "./wiki/catalog";
import { buildAnswerKeyUrl, buildProblemUrl, WIKI_BASE_URL } from "./wiki/urls";
import { fetchWikiPage } from "./wiki/fetcher";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

export interface LookupOptions extends FetchOptions {
    /** Wiki index.php base (default: the AoPS wiki) */
    baseUrl?: string;
    /** Clock that caps the accepted year (default: the current date) */
    now?: Date;
}

function fetchOptionsOf(options: LookupOptions): FetchOptions {
    const { baseUrl: _baseUrl, now: _now, ...fetchOptions } = options;
    return fetchOptions;
}

function assertQuestion(question: number): void {
    if (!Number.isInteger(question) || question < 1) {
        throw new InvalidTestError(`Question number must be a positive integer, got ${question}`);
    }
}

/**
 * Validate a year and test type and build the answer key URL.
 * Throws InvalidTestError for a year or test type the catalogue does not hold.
 */
export function resolveAnswerKey(
    year: number,
    testType: string,
    options: LookupOptions = {}
): { url: string; test: TestInfo } {
    const latest = latestTestYear(options.now);
    if (!Number.isInteger(year) || year < FIRST_TEST_YEAR || year > latest) {
        throw new InvalidTestError(
            `Year must be between ${FIRST_TEST_YEAR} and ${latest}, got ${year}`
        );
    }

    const test = resolveTestType(year, testType);
    if (test === null) {
        const offered = availableTests(year).map(t => t.type).join(", ");
        throw new InvalidTestError(
            `Test type "${testType.trim()}" was not held in ${year}. Available: ${offered}`
        );
    }

    return { url: buildAnswerKeyUrl(year, test, options.baseUrl ?? WIKI_BASE_URL), test };
}

/**
 * Fetch and extract the answer key of one test.
 * Rejects with InvalidTestError for an unknown year or test type, and with
 * NetworkError when the page cannot be fetched.
 */
export async function getAnswerKey(
    year: number,
    testType: string,
    options: LookupOptions = {}
): Promise<AnswerKeyResult> {
    const { url, test } = resolveAnswerKey(year, testType, options);
    logger.debug(`Answer key URL: ${url}`);

    const page = await fetchWikiPage(url, fetchOptionsOf(options));
    const answers = extractAnswers(page);

    if (answers === null) {
        logger.warn(`No answer list found at ${url}`);
    } else {
        logger.debug(`Found ${answers.length} answers at ${url}`);
    }

    return { url, test, year, answers };
}

/**
 * Fetch a question's problem page and list its solution sections
 */
export async function getSolutionSections(
    answerKeyUrl: string,
    question: number,
    options: LookupOptions = {}
): Promise<SectionListResult> {
    assertQuestion(question);

    const url = buildProblemUrl(answerKeyUrl, question);
    logger.debug(`Problem page URL: ${url}`);

    const page = await fetchWikiPage(url, fetchOptionsOf(options));
    const sections = listSections(page);
    logger.debug(`Found ${sections.length} sections at ${url}`);

    return { url, question, page, sections };
}

/**
 * Read one section (1-based, as listed to users) of an already fetched problem
 * page. Returns null when the section number is out of range.
 */
export function readSolution(
    problem: SectionListResult,
    sectionNumber: number
): SolutionResult | null {
    const title = problem.sections[sectionNumber - 1];
    if (!Number.isInteger(sectionNumber) || title === undefined) {
        return null;
    }

    return {
        url: problem.url,
        question: problem.question,
        sectionNumber,
        title,
        fragments: extractSection(problem.page, sectionNumber - 1),
    };
}

/**
 * Fetch a problem page and read one of its sections
 */
export async function getSolution(
    answerKeyUrl: string,
    question: number,
    sectionNumber: number,
    options: LookupOptions = {}
): Promise<SolutionResult | null> {
    const problem = await getSolutionSections(answerKeyUrl, question, options);
    return readSolution(problem, sectionNumber);
}
