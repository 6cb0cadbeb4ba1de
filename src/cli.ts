#!/usr/bin/env node

import { loadConfig } from "./config";
import { InvalidTestError, NetworkError, PromptCancelledError, errorMessage } from "./errors";
import {
    getAnswerKey,
    getSolutionSections,
    readSolution,
    resolveAnswerKey,
    type LookupOptions,
} from "./lookup";
import { formatAnswers, formatSections, renderParagraphs, testLabel } from "./output/format";
import { createConsolePrompter } from "./interactive/prompter";
import { parseArgs, toLookupOptions, type ParsedArgs } from "./utils/args";
import { runInteractiveSession } from "./interactive/session";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
amc-keys - AMC, AIME, AHSME and AJHSME answer keys and solutions from the AoPS wiki

COMMANDS:
  (none), interactive                   Browse answer keys and solutions interactively
  answers <year> <type>                 Print the answer key of a test
  sections <year> <type> <question>     List the solution sections of a problem
  solution <year> <type> <question> [section]
                                        Print one solution section (default: 1)
  mcp                                   Start the MCP server (called by MCP clients)
  help, --help                          Show this help message

OPTIONS:
  --timeout <ms>     Request timeout (default: 10000, env AMC_KEYS_TIMEOUT_MS)
  --fixed-agent      Send the same user agent on every request
  --debug            Show debug logging

TEST TYPES:
  8, 10, 10A, 10B, 12, 12A, 12B, AIME, AIME_I, AIME_II, AHSME, AJHSME

EXAMPLES:
  amc-keys answers 2019 10A
  amc-keys sections 2019 10A 25
  amc-keys solution 2019 10A 25 2
  amc-keys solution 1999 AIME 3 --timeout 20000
`;

function parsePositiveInt(value: string | undefined, name: string): number {
    const parsed = value !== undefined && /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidTestError(`${name} must be a positive integer, got "${value ?? ""}"`);
    }
    return parsed;
}

function requirePositionals(args: ParsedArgs, count: number, usage: string): void {
    if (args.positionals.length < count) {
        throw new InvalidTestError(`Usage: amc-keys ${usage}`);
    }
}

async function printAnswers(args: ParsedArgs, options: LookupOptions): Promise<boolean> {
    requirePositionals(args, 2, "answers <year> <type>");
    const [yearArg, type = ""] = args.positionals;
    const year = parsePositiveInt(yearArg, "Year");

    const result = await getAnswerKey(year, type, options);
    if (result.answers === null) {
        logger.error(`No answers found at ${result.url}. The page structure might have changed.`);
        return false;
    }

    console.log(formatAnswers(testLabel(result.year, result.test), result.answers));
    return true;
}

async function printSections(args: ParsedArgs, options: LookupOptions): Promise<boolean> {
    requirePositionals(args, 3, "sections <year> <type> <question>");
    const [yearArg, type = "", questionArg] = args.positionals;
    const year = parsePositiveInt(yearArg, "Year");
    const question = parsePositiveInt(questionArg, "Question");

    const { url } = resolveAnswerKey(year, type, options);
    const problem = await getSolutionSections(url, question, options);
    if (problem.sections.length === 0) {
        logger.error(`No solution sections found at ${problem.url}`);
        return false;
    }

    console.log(formatSections(problem.sections));
    return true;
}

async function printSolution(args: ParsedArgs, options: LookupOptions): Promise<boolean> {
    requirePositionals(args, 3, "solution <year> <type> <question> [section]");
    const [yearArg, type = "", questionArg, sectionArg] = args.positionals;
    const year = parsePositiveInt(yearArg, "Year");
    const question = parsePositiveInt(questionArg, "Question");
    const sectionNumber = sectionArg === undefined ? 1 : parsePositiveInt(sectionArg, "Section");

    const { url } = resolveAnswerKey(year, type, options);
    const problem = await getSolutionSections(url, question, options);
    const solution = readSolution(problem, sectionNumber);
    if (solution === null) {
        logger.error(
            `Section ${sectionNumber} does not exist at ${problem.url} (${problem.sections.length} sections)`
        );
        return false;
    }

    const text = renderParagraphs(solution.fragments);
    if (text === "") {
        logger.error("No readable solution content found in the selected section.");
        return false;
    }

    console.log(`${solution.title}\n${"-".repeat(solution.title.length)}\n${text}`);
    return true;
}

async function runInteractive(options: LookupOptions): Promise<void> {
    const prompter = createConsolePrompter();
    try {
        await runInteractiveSession({ prompter, lookup: options });
    } finally {
        prompter.close();
    }
}

async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));
    const config = loadConfig();
    logger.setDebugEnabled(config.debug || args.debug);
    const options = toLookupOptions(config, args);

    switch (args.command) {
        case undefined:
        case "interactive": {
            await runInteractive(options);
            break;
        }

        case "answers": {
            const ok = await printAnswers(args, options);
            if (!ok) process.exit(1);
            break;
        }

        case "sections": {
            const ok = await printSections(args, options);
            if (!ok) process.exit(1);
            break;
        }

        case "solution": {
            const ok = await printSolution(args, options);
            if (!ok) process.exit(1);
            break;
        }

        case "mcp": {
            // Dynamically import and run MCP server
            const { startServer } = await import("./mcp/server");
            await startServer(options);
            break;
        }

        case "--help":
        case "-h":
        case "help": {
            console.log(HELP_TEXT);
            break;
        }

        default: {
            console.log(`Unknown command: ${args.command}`);
            console.log("Run 'amc-keys --help' for usage.\n");
            process.exit(1);
        }
    }
}

// Run main
main().catch((err) => {
    if (err instanceof PromptCancelledError) {
        process.exit(0);
    }
    if (err instanceof InvalidTestError || err instanceof NetworkError) {
        logger.error(err.message);
        process.exit(1);
    }
    logger.error(`Unexpected error: ${errorMessage(err)}`);
    process.exit(1);
});
