/**
 * MCP tool handlers. Each returns the text shown to the client; failures are
 * reported in that text rather than thrown to the transport.
 */

import { InvalidTestError, NetworkError, errorMessage } from "../errors";
import {
    getAnswerKey,
    getSolutionSections,
    readSolution,
    resolveAnswerKey,
    type LookupOptions,
} from "../lookup";
import { formatAnswers, formatSections, renderParagraphs, testLabel } from "../output/format";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export interface AnswerKeyToolInput {
    year: number;
    testType: string;
}

export interface SolutionToolInput extends AnswerKeyToolInput {
    question: number;
    /** 1-based section number; omitted to list the sections */
    section?: number;
}

function describeFailure(err: unknown): string {
    if (err instanceof InvalidTestError) {
        return `Invalid request: ${err.message}`;
    }
    if (err instanceof NetworkError) {
        return `Error fetching ${err.url}: ${err.message}`;
    }
    return `Unexpected error: ${errorMessage(err)}`;
}

export async function answerKeyTool(
    input: AnswerKeyToolInput,
    options: LookupOptions = {}
): Promise<string> {
    try {
        const result = await getAnswerKey(input.year, input.testType, options);
        if (result.answers === null) {
            return `No answers found at ${result.url}. The test may not exist on the wiki, or the page layout is not recognized.`;
        }
        return `${formatAnswers(testLabel(result.year, result.test), result.answers)}\n\nSource: ${result.url}`;
    } catch (err) {
        logger.error(`answer key lookup failed: ${errorMessage(err)}`);
        return describeFailure(err);
    }
}

export async function solutionTool(
    input: SolutionToolInput,
    options: LookupOptions = {}
): Promise<string> {
    try {
        const { url: answerKeyUrl, test } = resolveAnswerKey(input.year, input.testType, options);
        const problem = await getSolutionSections(answerKeyUrl, input.question, options);
        const heading = `${testLabel(input.year, test)}, Problem ${input.question}`;

        if (problem.sections.length === 0) {
            return `${heading}\nSource: ${problem.url}\n\nNo solution sections found for this question.`;
        }

        if (input.section === undefined) {
            return `${heading}\nSource: ${problem.url}\n\nSections:\n${formatSections(problem.sections)}`;
        }

        const solution = readSolution(problem, input.section);
        if (solution === null) {
            return `${heading}\nSource: ${problem.url}\n\nSection ${input.section} does not exist. Sections:\n${formatSections(problem.sections)}`;
        }

        const text = renderParagraphs(solution.fragments);
        const body = text === "" ? "No readable solution content found in the selected section." : text;
        return `${heading}\nSource: ${problem.url}\n\n## ${solution.title}\n\n${body}`;
    } catch (err) {
        logger.error(`solution lookup failed: ${errorMessage(err)}`);
        return describeFailure(err);
    }
}
