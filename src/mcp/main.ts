/**
 * Standalone MCP server entry, configured from the environment only
 */

import { loadConfig, toFetchOptions } from "../config";
import { errorMessage } from "../errors";
import { startServer } from "./server";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

async function main(): Promise<void> {
    const config = loadConfig();
    logger.setDebugEnabled(config.debug);
    await startServer({ baseUrl: config.baseUrl, ...toFetchOptions(config) });
}

main().catch((error: unknown) => {
    logger.error(`Fatal error: ${errorMessage(error)}`);
    process.exit(1);
});
