/**
 * MCP server: the answer key and solution tools over stdio
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { answerKeyTool, solutionTool } from "./tools";
import type { LookupOptions } from "../lookup";
import { WIKI_BASE_URL } from "../wiki/urls";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

const testTypeSchema = z.string().describe(
    "Test type: 8, 10, 10A, 10B, 12, 12A, 12B, AIME, AIME_I, AIME_II, AHSME or AJHSME"
);

/**
 * Create the server with both tools registered; lookups use the given options
 */
export function createServer(lookupOptions: LookupOptions = {}): McpServer {
    const server = new McpServer({
        name: "amc_keys",
        version: "1.0.0",
    });

    // Register the answer key tool
    server.tool(
        "amc_answer_key",
        `Fetch the official answer key of an AMC-family competition from the AoPS wiki.

Covers AHSME (1950-1998), AJHSME (1985-1998), AIME (1983-1999), AIME I/II (2000-),
AMC 8 (1999-), AMC 10/12 (2000-2001) and AMC 10A/10B/12A/12B (2002-).

RETURNS: Numbered answers, one per question, with the source URL.`,
        {
            year: z.number().int().describe("Year the test was held"),
            testType: testTypeSchema,
        },
        async ({ year, testType }) => {
            const text = await answerKeyTool({ year, testType }, lookupOptions);
            return {
                content: [
                    {
                        type: "text",
                        text,
                    },
                ],
            };
        }
    );

    // Register the solution tool
    server.tool(
        "amc_solution",
        `Read community solutions to one problem of an AMC-family competition from the AoPS wiki.

Without "section", lists the sections of the problem page (Problem, Solution 1, Solution 2, ...).
With "section" (1-based, as listed), returns that section's text with math converted to plain text.`,
        {
            year: z.number().int().describe("Year the test was held"),
            testType: testTypeSchema,
            question: z.number().int().positive().describe("Question number, starting at 1"),
            section: z.number().int().positive().optional().describe("Section number from the listing (default: list sections)"),
        },
        async ({ year, testType, question, section }) => {
            const text = await solutionTool(
                {
                    year,
                    testType,
                    question,
                    ...(section !== undefined && { section }),
                },
                lookupOptions
            );
            return {
                content: [
                    {
                        type: "text",
                        text,
                    },
                ],
            };
        }
    );

    return server;
}

/**
 * Serve over stdio until the client disconnects
 */
export async function startServer(lookupOptions: LookupOptions = {}): Promise<void> {
    const server = createServer(lookupOptions);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.log(`amc_keys MCP server running on stdio (wiki: ${lookupOptions.baseUrl ?? WIKI_BASE_URL})`);
}
