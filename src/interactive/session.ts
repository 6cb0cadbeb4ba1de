/**
 * Interactive answer key and solution browser
 */

import type { AnswerKeyResult, SectionListResult, TestInfo } from "../types";
import { NetworkError, PromptCancelledError, errorMessage } from "../errors";
import { getAnswerKey, getSolutionSections, readSolution, type LookupOptions } from "../lookup";
import { FIRST_TEST_YEAR, availableTests, latestTestYear, resolveTestType } from "../wiki/catalog";
import { formatAnswers, formatSections, renderFragments, testLabel } from "../output/format";
import { isNo, isYes, parseBoundedInt, type BoundedIntOptions } from "./input";
import type { Prompter } from "./prompter";

export interface SessionOptions {
    prompter: Prompter;
    /** Line sink for everything the session shows (default: console.log) */
    print?: (line: string) => void;
    lookup?: LookupOptions;
    /** Clock used to cap the year range, here and in lookups */
    now?: Date;
}

class Session {
    private readonly prompter: Prompter;
    private readonly print: (line: string) => void;
    private readonly lookup: LookupOptions;
    private readonly now: Date;

    constructor(options: SessionOptions) {
        this.prompter = options.prompter;
        this.print = options.print ?? ((line: string) => console.log(line));
        this.now = options.now ?? options.lookup?.now ?? new Date();
        this.lookup = { ...options.lookup, now: this.now };
    }

    private success(message: string): void {
        this.print(`✓ ${message}`);
    }

    private failure(message: string): void {
        this.print(`✗ ${message}`);
    }

    private info(message: string): void {
        this.print(`  ${message}`);
    }

    private async askInt(question: string, options: BoundedIntOptions): Promise<number> {
        for (;;) {
            const result = parseBoundedInt(await this.prompter.ask(question), options);
            if (result.ok) return result.value;
            this.failure(result.message);
        }
    }

    private async askTestType(year: number): Promise<TestInfo> {
        this.print("");
        this.print(`Available test types for ${year}:`);
        for (const test of availableTests(year)) {
            this.print(`  • ${test.type} (${test.description})`);
        }
        this.print("");

        for (;;) {
            const input = await this.prompter.ask("Enter the test type: ");
            if (input.trim() === "") {
                this.failure("Test type cannot be empty. Please try again.");
                continue;
            }

            const test = resolveTestType(year, input);
            if (test !== null) {
                this.success(`Test type '${test.type}' is valid for the year ${year}.`);
                return test;
            }
            this.failure("Invalid test type. Please choose from the available options.");
        }
    }

    private async browseSolutions(answerKeyUrl: string, questionCount: number): Promise<void> {
        this.info(`Ready to fetch solutions for questions 1 to ${questionCount}.`);

        for (;;) {
            const question = await this.askInt("Enter the question number (or 0 to exit): ", {
                min: 1,
                max: questionCount,
            });
            if (question === 0) {
                this.info("Exiting solution finder.");
                return;
            }

            this.info(`Fetching solution page for question ${question}...`);
            let problem: SectionListResult;
            try {
                problem = await getSolutionSections(answerKeyUrl, question, this.lookup);
            } catch (err) {
                if (err instanceof NetworkError) {
                    this.failure(`Network error while fetching the page: ${err.message}`);
                    continue;
                }
                throw err;
            }

            if (problem.sections.length === 0) {
                this.failure("No solution sections found for this question.");
                continue;
            }

            this.info("Available solution sections:");
            this.print(formatSections(problem.sections));

            const choice = await this.askInt("Enter section number to view (or 0 to go back): ", {
                min: 1,
                max: problem.sections.length,
            });
            if (choice === 0) continue;

            const solution = readSolution(problem, choice);
            const text = solution === null ? "" : renderFragments(solution.fragments);
            if (text === "") {
                this.failure("No readable solution content found in the selected section.");
                continue;
            }

            this.success("Solution:");
            this.print(text);
        }
    }

    /**
     * One pass: pick a test, show its answers, optionally browse solutions.
     * Returns false when the user is done.
     */
    private async runOnce(): Promise<boolean> {
        const latest = latestTestYear(this.now);
        const year = await this.askInt("Enter the year of the AMC test: ", {
            min: FIRST_TEST_YEAR,
            max: latest,
            minMessage: `Tests started in ${FIRST_TEST_YEAR}, please enter a year after.`,
            maxMessage: "Do not enter a year in the future",
            allowZero: false,
        });
        const test = await this.askTestType(year);

        let result: AnswerKeyResult | undefined;
        try {
            this.info(`Fetching answers for ${testLabel(year, test)}...`);
            result = await getAnswerKey(year, test.type, this.lookup);
        } catch (err) {
            if (!(err instanceof NetworkError)) throw err;
            this.failure(`Error fetching the webpage: ${err.message}`);
        }

        if (result?.answers) {
            this.print("");
            this.print(formatAnswers(testLabel(year, test), result.answers));

            const wantsSolutions = await this.prompter.ask(
                "\nDo you want to see the solutions to the answers? (yes/no): "
            );
            if (isYes(wantsSolutions)) {
                await this.browseSolutions(result.url, result.answers.length);
            }
        } else {
            this.failure("Failed to retrieve answers. Please check if the test exists on AoPS wiki.");
        }

        const again = await this.prompter.ask("\nDo you want to scrape another test? (yes/no): ");
        return !isNo(again);
    }

    async run(): Promise<void> {
        this.print("AMC/AIME/AJHSME Answer Key Scraper");
        this.print("=".repeat(40));

        for (;;) {
            try {
                if (!(await this.runOnce())) return;
            } catch (err) {
                if (err instanceof PromptCancelledError) throw err;
                this.failure(`An unexpected error occurred: ${errorMessage(err)}`);
            }
            this.print("");
            this.print("=".repeat(40));
        }
    }
}

/**
 * Run the interactive session until the user declines another test.
 * Rejects with PromptCancelledError when input is interrupted.
 */
export async function runInteractiveSession(options: SessionOptions): Promise<void> {
    await new Session(options).run();
}
