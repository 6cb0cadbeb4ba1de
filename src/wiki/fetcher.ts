/**
 * Fetches wiki pages over HTTP and parses them for the extractors
 */

import type { FetchOptions, Page } from "../types";
import { NetworkError } from "../errors";
import { loadPage } from "../extraction/page";
import { pickUserAgent } from "./user-agents";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export const DEFAULT_TIMEOUT_MS = 10000;

/**
 * Fetch a URL and return its HTML.
 * Rejects with NetworkError on timeout, connection failure or a non-2xx status.
 */
export async function fetchHtml(url: string, options: FetchOptions = {}): Promise<string> {
    const {
        timeout = DEFAULT_TIMEOUT_MS,
        userAgentStrategy = "rotate",
        userAgent,
    } = options;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const agent = pickUserAgent(userAgentStrategy, userAgent);

    logger.debug(`GET ${url} (timeout ${timeout}ms, user agent "${agent}")`);

    try {
        const response = await fetch(url, {
            signal: controller.signal,
            headers: {
                "User-Agent": agent,
                "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
                "Accept-Language": "en-US,en;q=0.5",
            },
            redirect: "follow",
        });

        if (!response.ok) {
            throw new NetworkError(
                `HTTP ${response.status}: ${response.statusText} for ${url}`,
                url,
                response.status
            );
        }

        return await response.text();
    } catch (error) {
        if (error instanceof NetworkError) {
            throw error;
        }
        if (error instanceof Error && error.name === "AbortError") {
            throw new NetworkError(`Timeout after ${timeout}ms fetching ${url}`, url, undefined, { cause: error });
        }
        const message = error instanceof Error ? error.message : "Unknown error";
        throw new NetworkError(`Failed to fetch ${url}: ${message}`, url, undefined, { cause: error });
    } finally {
        clearTimeout(timeoutId);
    }
}

/**
 * Fetch a wiki page and parse it
 */
export async function fetchWikiPage(url: string, options: FetchOptions = {}): Promise<Page> {
    const html = await fetchHtml(url, options);
    return loadPage(html);
}
